import { Logger } from 'winston';
import type { ZodType, ZodTypeDef } from 'zod';
import { KubernetesClient } from './KubernetesClient.js';
import { KubernetesError, convertApiError } from './ErrorHandling.js';

/**
 * Common options for read-only listings
 */
export interface ResourceOperationOptions {
  /**
   * Namespace to list from. Absent or "all" means every namespace
   */
  namespace?: string;

  /**
   * Label selector for filtering resources
   */
  labelSelector?: string;
}

export const ALL_NAMESPACES = 'all';

export function isAllNamespaces(namespace?: string): boolean {
  return !namespace || namespace === ALL_NAMESPACES;
}

/**
 * Base class for resource operations: shared client access and error conversion
 */
export abstract class BaseResourceOperations {
  protected logger?: Logger;

  constructor(
    protected client: KubernetesClient,
    protected resourceType: string,
    logger?: Logger,
  ) {
    this.logger = logger;
  }

  /**
   * Convert an API error to a typed KubernetesError carrying the resource context
   */
  protected handleApiError(error: unknown, operation: string, resourceName?: string): never {
    const typedError = convertApiError(error);

    if (resourceName) {
      Object.assign(typedError.details, {
        resource: this.resourceType,
        resourceName,
        operation,
      });
    }

    throw typedError;
  }

  /**
   * Validate an untyped response body (custom objects come back as `object`)
   */
  protected parseBody<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    body: unknown,
    operation: string,
  ): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      const detail = issue?.message ?? 'invalid payload';
      throw new KubernetesError(
        `Malformed ${this.resourceType} response for ${operation}${where}: ${detail}`,
        'INVALID_RESPONSE',
        undefined,
        false,
        { resource: this.resourceType, operation },
      );
    }
    return result.data;
  }
}
