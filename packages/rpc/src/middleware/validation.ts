/**
 * @fileoverview Params validation
 *
 * Checks request params against a per-method zod schema before the handler
 * runs. `defineMethod` reports its failures in the same issue format.
 */

import type { ZodError, ZodTypeAny } from 'zod';
import { InvalidParamsError } from '../errors.js';
import type { Middleware } from './index.js';

/** Params schema per method name */
export type ParamSchemas = ReadonlyMap<string, ZodTypeAny> | Readonly<Record<string, ZodTypeAny>>;

/** One failed check, as sent in `error.data.issues` */
export interface ParamIssue {
  path: string;
  message: string;
  code: string;
}

export interface ParamsValidationOptions {
  /**
   * Hand the parsed (possibly transformed) params to the handler instead
   * of the raw ones. Default: true.
   */
  replaceParams?: boolean;
}

const WHOLE_PARAMS = 'params';

export function toParamIssues(error: ZodError): ParamIssue[] {
  return error.issues.map(({ path, message, code }) => ({
    path: path.length > 0 ? path.join('.') : WHOLE_PARAMS,
    message,
    code,
  }));
}

/**
 * `path: message` per issue, joined with `; `. An issue about the params as
 * a whole is just its message.
 */
export function describeIssues(issues: readonly ParamIssue[]): string {
  return issues
    .map((issue) => (issue.path === WHOLE_PARAMS ? issue.message : `${issue.path}: ${issue.message}`))
    .join('; ');
}

/**
 * Build the InvalidParams error for a failed parse
 */
export function invalidParams(error: ZodError, prefix?: string): InvalidParamsError {
  const issues = toParamIssues(error);
  const detail = describeIssues(issues);
  return new InvalidParamsError(prefix ? `${prefix}: ${detail}` : detail, { issues });
}

function isSchemaMap(schemas: ParamSchemas): schemas is ReadonlyMap<string, ZodTypeAny> {
  return schemas instanceof Map;
}

function schemaFor(schemas: ParamSchemas, method: string): ZodTypeAny | undefined {
  if (isSchemaMap(schemas)) {
    return schemas.get(method);
  }
  return Object.hasOwn(schemas, method) ? schemas[method] : undefined;
}

/**
 * @example
 * ```typescript
 * const validate = createValidationMiddleware({
 *   moj_getProof: z.tuple([z.string().regex(/^0x[0-9a-f]+$/i)]),
 * });
 *
 * new RpcService(context, registry, { middleware: [validate] });
 * ```
 */
export function createValidationMiddleware(
  schemas: ParamSchemas,
  options: ParamsValidationOptions = {}
): Middleware {
  const replaceParams = options.replaceParams ?? true;

  return async (request, next) => {
    const schema = schemaFor(schemas, request.method);
    if (schema === undefined) {
      return next(request);
    }

    const parsed = schema.safeParse(request.params);
    if (!parsed.success) {
      throw invalidParams(parsed.error);
    }
    return next(replaceParams ? { ...request, params: parsed.data } : request);
  };
}
