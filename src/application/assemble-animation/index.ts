export * from './commands/assemble-animation.command.js';
export * from './commands/assemble-directory.command.js';
export * from './dto/assemble-animation.dto.js';
export * from './handlers/assemble-animation.handler.js';
export * from './handlers/assemble-directory.handler.js';
