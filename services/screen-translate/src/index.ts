export * from './errors';
export * from './app';
export { httpRequest, HttpNetworkError, HttpTimeoutError } from './http';
export type { HttpResponse, HttpRequestOptions } from './http';

export type { TranslationProvider, TranslateOptions } from './translate/TranslationProvider';
export { BaseTranslationProvider } from './translate/BaseTranslationProvider';
export type { ProviderDeps } from './translate/BaseTranslationProvider';
export { ArgosProvider, spawnProcess } from './translate/ArgosProvider';
export type { ArgosOptions, ProcessResult, ProcessRunner } from './translate/ArgosProvider';
export { MTranServerProvider } from './translate/MTranServerProvider';
export { BaiduProvider, baiduSign } from './translate/BaiduProvider';
export { GoogleProvider } from './translate/GoogleProvider';
export { DeepLProvider } from './translate/DeepLProvider';
export { LLMTranslationProvider, CompatibleProvider, splitBatchResponse } from './translate/LLMTranslationProvider';
export type { LLMDialect } from './translate/LLMTranslationProvider';
export { ProviderRegistry } from './translate/ProviderRegistry';
export type { ProviderRegistryDeps } from './translate/ProviderRegistry';
export { TranslationOrchestrator } from './translate/TranslationOrchestrator';
export type { TranslateRequest, EngineTranslation, EngineComparison } from './translate/TranslationOrchestrator';

export type { VisionProvider } from './extraction/VisionProvider';
export { BaseVisionProvider } from './extraction/BaseVisionProvider';
export {
  OpenAIVisionProvider,
  ClaudeVisionProvider,
  GeminiVisionProvider,
  OllamaVisionProvider,
  createVisionProvider,
} from './extraction/providers';
export { TextExtractionEngine, EXTRACTION_PROMPT, parseSegments } from './extraction/TextExtractionEngine';
export type { VisionSettings, TextExtractionDeps } from './extraction/TextExtractionEngine';
export { loadCapturedImage, prepareForVision } from './extraction/imageProcessor';

export { FlowController } from './flow/FlowController';
export type { FlowPhase, FlowResult, FlowOutcome, FlowSettings, FlowControllerDeps } from './flow/FlowController';

export { OverlayRenderer } from './render/OverlayRenderer';

export { InMemoryCredentialStore } from './storage/CredentialStore';
export type { CredentialStore, CredentialSummary } from './storage/CredentialStore';
export { SqliteCredentialStore } from './storage/SqliteCredentialStore';
export { KeyStorage } from './storage/KeyStorage';
export { HistoryStore } from './storage/HistoryStore';
export type { HistoryEntry, HistoryRecord } from './storage/HistoryStore';
export { openDatabase } from './storage/database';
