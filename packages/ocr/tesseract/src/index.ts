export { TESSERACT_ENGINE_ID, TesseractEngine } from './tesseract-engine.js';
export type { TesseractEngineConfig, TesseractEngineOptions } from './tesseract-engine.js';
export { TesseractLanguageResolver } from './language-resolver.js';
export type { TesseractLanguageResolverOptions } from './language-resolver.js';
