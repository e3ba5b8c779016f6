import type { AssembleAnimationInput } from '../dto/assemble-animation.dto.js';

export class AssembleAnimationCommand {
  public readonly payload: AssembleAnimationInput;

  public constructor(payload: AssembleAnimationInput) {
    this.payload = payload;
  }
}
