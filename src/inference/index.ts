export {
  InferenceRouter,
  BACKEND_TYPES,
  enhancePrompt,
  toAlternating,
  type BackendType,
  type ChatMessage,
  type GenerationSettings,
  type InferenceBackend,
  type InferenceRequest,
  type InferenceResponse,
  type InferenceRouterOptions,
  type TextGenerator
} from './router.js';
