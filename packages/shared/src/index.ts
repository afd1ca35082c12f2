export * from './commands.js';
export * from './slides.js';
export * from './errors.js';
export * from './text.js';
