export * from './command-executor.js';
export * from './router-commands.js';
export * from './ssh-executor.js';
