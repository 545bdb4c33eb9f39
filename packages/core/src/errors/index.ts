export { TranslationError } from './translation-error.js';
export type { TranslationErrorCode, TranslationErrorDetails } from './translation-error.js';
