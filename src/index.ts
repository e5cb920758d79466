export { CoreNlpClient, createCoreNlpClient } from './core/client.js';
export type { CoreNlpClientOptions, DefaultClient } from './core/client.js';
export { selectLanguage, withModelOverride, modelsOfFamily } from './core/language_profile.js';
export type { LanguageProfile } from './core/language_profile.js';
export { resolveLanguage, tryResolveLanguage, supportedLanguages, isLanguageCode, LANGUAGES } from './core/language_registry.js';
export type { LanguageCode } from './core/language_registry.js';
export { ModelCatalog, getModelCatalog } from './core/model_catalog.js';
export type { FamilyModels, FlatModel } from './core/model_catalog.js';
export { resolveConfiguration, readableFile, SUTIME_RULE_FILES } from './core/resolver.js';
export type { ResolvedConfiguration, FileProbe, ResolveOptions } from './core/resolver.js';
export { CoreNlpServerGateway } from './core/gateway.js';
export type { PipelineGateway, PipelineHandle } from './core/gateway.js';
export { JvmServerLauncher, NoopBootstrap, buildJavaArgs, buildClasspath } from './core/bootstrap.js';
export type { Bootstrap, LauncherOptions, ServerProcess, SpawnServer } from './core/bootstrap.js';
export * from './core/errors.js';
export { loadCoreNlpConfig, serverUrl } from './config/corenlp.js';
export type { CoreNlpConfig } from './config/corenlp.js';
export { createLogger } from './util/logging.js';
export type { AnnotatedDocumentT, SentenceT, TokenT } from './schemas/corenlp.js';
