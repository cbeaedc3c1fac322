export * from './memory-security-storage.js';
