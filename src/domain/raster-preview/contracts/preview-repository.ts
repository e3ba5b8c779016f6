import type { RgbaImage } from '../value-objects/preview-image.js';

export interface PreviewRepository {
  /** Creates the directory previews are written to, if absent. */
  prepare(directory: string): Promise<void>;
  save(image: RgbaImage, filePath: string): Promise<void>;
  load(filePath: string): Promise<RgbaImage>;
}
