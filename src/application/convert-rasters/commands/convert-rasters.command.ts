import type { ConvertRastersInput } from '../dto/convert-rasters.dto.js';

export class ConvertRastersCommand {
  public readonly payload: ConvertRastersInput;

  public constructor(payload: ConvertRastersInput) {
    this.payload = payload;
  }
}
