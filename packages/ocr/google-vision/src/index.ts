export {
  DEFAULT_VISION_TIMEOUT_MS,
  fetchHttpPost,
  GOOGLE_VISION_ENGINE_ID,
  GoogleVisionEngine,
  VISION_API_URL,
} from './google-vision-engine.js';
export type { GoogleVisionEngineConfig, HttpPostFn, HttpPostOptions } from './google-vision-engine.js';
export { DEFAULT_VISION_MODEL, GoogleVisionModelResolver } from './model-resolver.js';
