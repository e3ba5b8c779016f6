import type { PipelineConfigInput } from '../dto/pipeline-config.dto.js';

export class RunPipelineCommand {
  public readonly payload: PipelineConfigInput;

  public constructor(payload: PipelineConfigInput) {
    this.payload = payload;
  }
}
