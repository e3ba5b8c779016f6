export * from './commands/run-pipeline.command.js';
export * from './dto/pipeline-config.dto.js';
export * from './handlers/run-pipeline.handler.js';
