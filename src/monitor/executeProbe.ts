import axios, { type AxiosInstance, type AxiosResponse } from 'axios';

import { DEFAULT_REQUEST_TIMEOUT_MS } from '../config';
import type { ProbeOutcome, TestDefinition } from '../types/probe';
import { logger as defaultLogger, type LoggerService } from '../utils/logger';

const USER_AGENT = 'endpoint-monitor/1.0';

export interface ProbeExecutorOptions {
  http?: AxiosInstance;
  timeoutMs?: number;
  logger?: Pick<LoggerService, 'debug'>;
}

export class ProbeExecutor {
  private http: AxiosInstance;
  private timeoutMs: number;
  private logger: Pick<LoggerService, 'debug'>;

  constructor(options: ProbeExecutorOptions = {}) {
    this.http = options.http ?? axios.create();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Issues a single request for the test. Never rejects: transport faults and
   * unsupported methods come back as a failure outcome.
   */
  public async execute(test: TestDefinition): Promise<ProbeOutcome> {
    const method = test.method;
    let request: () => Promise<AxiosResponse<string>>;

    switch (method.kind) {
      case 'retrieve':
        request = () =>
          this.http.get<string>(test.url, {
            ...this.requestConfig(),
            params: test.queryArgs,
          });
        break;
      case 'submit':
        request = () => this.http.post<string>(test.url, test.payload, this.requestConfig());
        break;
      case 'unsupported':
        return {
          kind: 'failure',
          reason: 'unsupported_method',
          description: `Unsupported method "${method.raw}"`,
        };
      default: {
        const unreachable: never = method;
        throw new Error(`Unhandled probe method: ${JSON.stringify(unreachable)}`);
      }
    }

    this.logger.debug(`Probing ${test.name}`, { url: test.url, method: method.kind });

    try {
      const response = await request();
      return {
        kind: 'response',
        statusCode: response.status,
        responseText: toResponseText(response.data),
      };
    } catch (error) {
      return {
        kind: 'failure',
        reason: 'transport',
        description: this.getErrorMessage(error, test.url),
      };
    }
  }

  private requestConfig() {
    return {
      timeout: this.timeoutMs,
      // The socket timeout alone does not bound a slowly trickling response.
      signal: AbortSignal.timeout(this.timeoutMs),
      responseType: 'text' as const,
      // Every status code is a classifiable response, never a thrown error.
      validateStatus: () => true,
      headers: {
        'User-Agent': USER_AGENT,
      },
    };
  }

  private getErrorMessage(error: unknown, url: string): string {
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' || error.code === 'ERR_CANCELED') {
        return `Request timed out after ${this.timeoutMs}ms`;
      } else if (error.code === 'ENOTFOUND') {
        return `DNS resolution failed for ${hostOf(url)}`;
      } else if (error.code === 'ECONNREFUSED') {
        return 'Connection refused';
      } else if (error.code === 'ECONNRESET') {
        return 'Connection reset';
      } else {
        return error.message || 'Unknown transport error';
      }
    }

    return error instanceof Error && error.message ? error.message : 'Unknown transport error';
  }
}

function hostOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return url;
  }
}

function toResponseText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}
