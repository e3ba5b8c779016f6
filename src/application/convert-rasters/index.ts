export * from './commands/convert-rasters.command.js';
export * from './dto/convert-rasters.dto.js';
export * from './handlers/convert-rasters.handler.js';
