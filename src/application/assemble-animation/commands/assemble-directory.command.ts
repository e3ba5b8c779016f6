import type { AssembleDirectoryInput } from '../dto/assemble-animation.dto.js';

export class AssembleDirectoryCommand {
  public readonly payload: AssembleDirectoryInput;

  public constructor(payload: AssembleDirectoryInput) {
    this.payload = payload;
  }
}
