import type pino from 'pino';
import { AnnotatedDocument, type AnnotatedDocumentT } from '../schemas/corenlp.js';
import { ExternalFetchError, requestText, type TextResponse } from '../util/fetch.js';
import { AnnotationError, PipelineConstructionError } from './errors.js';
import type { ResolvedConfiguration } from './resolver.js';

export interface PipelineHandle {
  readonly properties: ResolvedConfiguration;
  annotate(text: string): Promise<AnnotatedDocumentT>;
}

/**
 * The only consumer of a resolved configuration. Implementations turn the
 * property bag into a ready pipeline or reject it.
 */
export interface PipelineGateway {
  createPipeline(properties: ResolvedConfiguration): Promise<PipelineHandle>;
}

export interface ServerGatewayOptions {
  baseUrl: string;
  timeoutMs?: number;
  log?: pino.Logger;
}

/**
 * Talks to a running StanfordCoreNLPServer. Each pipeline is the server plus
 * a fixed property set sent along with every request.
 */
export class CoreNlpServerGateway implements PipelineGateway {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly log?: pino.Logger;

  constructor(opts: ServerGatewayOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs ?? 15000;
    this.log = opts.log;
  }

  async createPipeline(properties: ResolvedConfiguration): Promise<PipelineHandle> {
    let status: number;
    let body: string;
    try {
      ({ status, body } = await requestText(`${this.baseUrl}/ready`, { timeoutMs: this.timeoutMs }));
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new PipelineConstructionError(`CoreNLP server at ${this.baseUrl} is unreachable: ${reason}`, { cause: e });
    }
    if (status < 200 || status >= 300) {
      throw new PipelineConstructionError(
        `CoreNLP server at ${this.baseUrl} is not ready (HTTP ${status}): ${body.trim()}`,
      );
    }

    const frozen = Object.freeze({ ...properties });
    this.log?.debug({ baseUrl: this.baseUrl, annotators: frozen.annotators }, 'CoreNLP: pipeline ready');
    return {
      properties: frozen,
      annotate: (text: string) => this.annotate(frozen, text),
    };
  }

  private async annotate(properties: ResolvedConfiguration, text: string): Promise<AnnotatedDocumentT> {
    const query = encodeURIComponent(JSON.stringify({ ...properties, outputFormat: 'json' }));
    const url = `${this.baseUrl}/?properties=${query}`;

    let res: TextResponse;
    try {
      res = await requestText(url, {
        method: 'POST',
        body: text,
        timeoutMs: this.timeoutMs,
        headers: { 'Content-Type': 'text/plain; charset=utf-8' },
      });
    } catch (e) {
      if (e instanceof ExternalFetchError) {
        throw new AnnotationError(e.message, undefined, { cause: e });
      }
      throw e;
    }

    if (!res.ok) {
      throw new AnnotationError(`CoreNLP rejected the request (HTTP ${res.status}): ${res.body.trim()}`, res.status);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(res.body);
    } catch (e) {
      throw new AnnotationError('CoreNLP returned malformed JSON', res.status, { cause: e });
    }
    const parsed = AnnotatedDocument.safeParse(payload);
    if (!parsed.success) {
      throw new AnnotationError(`Unexpected CoreNLP response: ${parsed.error.issues[0]?.message ?? 'invalid'}`, res.status);
    }
    this.log?.debug({ sentences: parsed.data.sentences.length }, 'CoreNLP: text annotated');
    return parsed.data;
  }
}
