import type pino from 'pino';
import { loadCoreNlpConfig, serverUrl, type CoreNlpConfig } from '../config/corenlp.js';
import { createLogger } from '../util/logging.js';
import { JvmServerLauncher, NoopBootstrap, type Bootstrap } from './bootstrap.js';
import { CoreNlpServerGateway, type PipelineGateway, type PipelineHandle } from './gateway.js';
import { selectLanguage, withModelOverride, type LanguageProfile } from './language_profile.js';
import { getModelCatalog, type ModelCatalog } from './model_catalog.js';
import { resolveConfiguration, type FileProbe, type ResolvedConfiguration } from './resolver.js';

export interface CoreNlpClientOptions {
  config: CoreNlpConfig;
  gateway: PipelineGateway;
  bootstrap?: Bootstrap;
  probe?: FileProbe;
  catalog?: ModelCatalog;
  log?: pino.Logger;
}

/**
 * Entry point for callers: pick a language, optionally swap single model
 * files, then load pipelines for ordered annotator lists.
 */
export class CoreNlpClient {
  private readonly config: CoreNlpConfig;
  private readonly gateway: PipelineGateway;
  private readonly bootstrap: Bootstrap;
  private readonly probe?: FileProbe;
  private readonly catalog: ModelCatalog;
  private readonly log?: pino.Logger;

  constructor(opts: CoreNlpClientOptions) {
    this.config = opts.config;
    this.gateway = opts.gateway;
    this.bootstrap = opts.bootstrap ?? new NoopBootstrap();
    this.probe = opts.probe;
    this.catalog = opts.catalog ?? getModelCatalog();
    this.log = opts.log;
  }

  selectLanguage(token: string = this.config.defaultLanguage): LanguageProfile {
    const profile = selectLanguage(token, this.catalog);
    this.log?.debug({ token, language: profile.language, models: profile.modelFiles.size }, 'CoreNLP: language selected');
    return profile;
  }

  setModelOverride(profile: LanguageProfile, key: string, relativePath: string): LanguageProfile {
    return withModelOverride(profile, key, relativePath, this.catalog);
  }

  resolve(
    profile: LanguageProfile,
    annotators: readonly string[],
    custom: Readonly<Record<string, string>> = {},
  ): ResolvedConfiguration {
    return resolveConfiguration(profile, annotators, {
      modelPath: this.config.modelPath,
      custom: { ...this.config.defaultProperties, ...custom },
      probe: this.probe,
      catalog: this.catalog,
      log: this.log,
    });
  }

  /**
   * Resolves the configuration, makes sure the engine is running and asks the
   * gateway for a pipeline. Gateway failures reach the caller untouched.
   */
  async loadPipeline(
    profile: LanguageProfile,
    annotators: readonly string[],
    custom: Readonly<Record<string, string>> = {},
  ): Promise<PipelineHandle> {
    const properties = this.resolve(profile, annotators, custom);
    await this.bootstrap.ensureStarted();
    return this.gateway.createPipeline(properties);
  }
}

export interface DefaultClient {
  client: CoreNlpClient;
  launcher: JvmServerLauncher | null;
}

/**
 * Wires the server gateway and, unless the server is managed elsewhere, a
 * JVM launcher from configuration.
 */
export function createCoreNlpClient(
  config: CoreNlpConfig = loadCoreNlpConfig(),
  log: pino.Logger = createLogger(),
): DefaultClient {
  const launcher = config.externalServer
    ? null
    : new JvmServerLauncher({
        jarPath: config.jarPath,
        jars: config.jars,
        jvmArgs: config.jvmArgs,
        host: config.host,
        port: config.port,
        timeoutMs: config.timeoutMs,
        startTimeoutMs: config.startTimeoutMs,
        logFile: config.logFile,
        log,
      });
  const gateway = new CoreNlpServerGateway({ baseUrl: serverUrl(config), timeoutMs: config.timeoutMs, log });
  const client = new CoreNlpClient({ config, gateway, bootstrap: launcher ?? new NoopBootstrap(), log });
  return { client, launcher };
}
