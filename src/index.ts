// Companion bot - private Telegram companion backed by an OpenAI-compatible model
// Main entry point for library usage

export * from './config/index.js';
export * from './memory/index.js';
export * from './providers/index.js';
export * from './agent/index.js';
export * from './proactive/index.js';
export * from './reporting/index.js';
export * from './channels/index.js';
export * from './gateway/index.js';
export * from './utils/index.js';
