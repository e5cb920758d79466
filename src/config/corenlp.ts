import path from 'node:path';
import { z } from 'zod';

const DEFAULT_JAR_PATH = path.resolve(__dirname, '..', '..', 'bin') + path.sep;

const PropertiesJson = z
  .string()
  .transform((raw, ctx) => {
    try {
      const value: unknown = JSON.parse(raw);
      return value;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'CORENLP_PROPERTIES must be JSON' });
      return z.NEVER;
    }
  })
  .pipe(z.record(z.coerce.string()));

const CoreNlpConfigSchema = z.object({
  jarPath: z.string().min(1).default(DEFAULT_JAR_PATH),
  modelPath: z.string().min(1).optional(),
  defaultLanguage: z.string().min(1).default('english'),
  jars: z
    .string()
    .default('*')
    .transform((s) => s.split(',').map((j) => j.trim()).filter(Boolean)),
  jvmArgs: z
    .string()
    .default('-Xms512M -Xmx1024M')
    .transform((s) => s.split(/\s+/).filter(Boolean)),
  host: z.string().min(1).default('localhost'),
  port: z.coerce.number().int().min(1).max(65535).default(9000),
  timeoutMs: z.coerce.number().min(100).default(15000),
  startTimeoutMs: z.coerce.number().min(1000).default(60000),
  logFile: z.string().min(1).optional(),
  defaultProperties: PropertiesJson.default('{}'),
  externalServer: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),
});

export type CoreNlpConfig = Omit<z.infer<typeof CoreNlpConfigSchema>, 'modelPath'> & {
  modelPath: string;
};

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

export function loadCoreNlpConfig(env: NodeJS.ProcessEnv = process.env): CoreNlpConfig {
  const parsed = CoreNlpConfigSchema.parse({
    jarPath: emptyToUndefined(env.CORENLP_JAR_PATH),
    modelPath: emptyToUndefined(env.CORENLP_MODEL_PATH),
    defaultLanguage: emptyToUndefined(env.CORENLP_LANGUAGE),
    jars: emptyToUndefined(env.CORENLP_JARS),
    jvmArgs: emptyToUndefined(env.CORENLP_JVM_ARGS),
    host: emptyToUndefined(env.CORENLP_HOST),
    port: emptyToUndefined(env.CORENLP_PORT),
    timeoutMs: emptyToUndefined(env.CORENLP_TIMEOUT_MS),
    startTimeoutMs: emptyToUndefined(env.CORENLP_START_TIMEOUT_MS),
    logFile: emptyToUndefined(env.CORENLP_LOG_FILE),
    defaultProperties: emptyToUndefined(env.CORENLP_PROPERTIES),
    externalServer: emptyToUndefined(env.CORENLP_EXTERNAL_SERVER),
  });
  // Models sit next to the jars unless told otherwise.
  return { ...parsed, modelPath: parsed.modelPath ?? parsed.jarPath };
}

export function serverUrl(config: Pick<CoreNlpConfig, 'host' | 'port'>): string {
  return `http://${config.host}:${config.port}`;
}
