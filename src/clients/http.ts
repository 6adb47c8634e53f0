import type { ZodType, ZodTypeDef } from 'zod';
import { isTimeoutError } from '../errors/AgentErrors.js';
import { errorMessage } from '../utils/Logger.js';

/**
 * A call to Ollama or Qdrant failed: transport error, timeout, non-2xx status or a payload
 * that did not match the expected shape.
 */
export class UpstreamRequestError extends Error {
  public readonly status?: number;
  public readonly timedOut: boolean;

  constructor(
    message: string,
    options: { status?: number; timedOut?: boolean; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'UpstreamRequestError';
    this.status = options.status;
    this.timedOut = options.timedOut ?? false;
    Object.setPrototypeOf(this, UpstreamRequestError.prototype);
  }
}

export interface JsonRequestOptions<T> {
  method?: 'GET' | 'POST' | 'PUT';
  body?: unknown;
  timeoutMs: number;
  schema: ZodType<T, ZodTypeDef, unknown>;
}

const MAX_ERROR_BODY = 200;

/**
 * fetch + AbortSignal.timeout + zod validation of the JSON answer
 */
export async function requestJson<T>(url: string, options: JsonRequestOptions<T>): Promise<T> {
  const method = options.method ?? 'GET';
  const target = `${method} ${url}`;

  let response: Response;
  try {
    response = await fetch(url, {
      method,
      headers: options.body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    throw new UpstreamRequestError(`${target} failed: ${errorMessage(error)}`, {
      timedOut: isTimeoutError(error),
      cause: error,
    });
  }

  if (!response.ok) {
    let detail = '';
    try {
      detail = (await response.text()).slice(0, MAX_ERROR_BODY);
    } catch (error) {
      detail = `unreadable body (${errorMessage(error)})`;
    }
    throw new UpstreamRequestError(
      `${target} returned ${response.status}${detail ? `: ${detail}` : ''}`,
      { status: response.status },
    );
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw new UpstreamRequestError(`${target} returned invalid JSON: ${errorMessage(error)}`, {
      status: response.status,
      timedOut: isTimeoutError(error),
      cause: error,
    });
  }

  const parsed = options.schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new UpstreamRequestError(
      `${target} returned an unexpected payload${where}: ${issue?.message ?? 'invalid'}`,
      { status: response.status },
    );
  }
  return parsed.data;
}
