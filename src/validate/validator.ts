/**
 * Post-construction validation of config instances.
 *
 * Validation is depth-first: sub-configs are validated before the config that
 * holds them, fields are visited in declaration order, and the first failure
 * stops the walk.
 *
 * @packageDocumentation
 */

import { ConfigValidationError, type ValidationIssue } from '../errors/index.js';
import { introspect } from '../schema/introspect.js';
import type { ConfigType, ValidationOutcome } from '../schema/types.js';

/**
 * Options for {@link validateConfig}.
 */
export interface ValidateConfigOptions {
  /**
   * Types treated as sub-configs without the nested marker. Pass the same
   * list used to materialize the instance.
   */
  readonly subClasses?: Iterable<ConfigType<unknown>> | undefined;
}

function isIssueList(outcome: ValidationOutcome): outcome is readonly ValidationIssue[] {
  return Array.isArray(outcome);
}

function summarize(issues: readonly ValidationIssue[]): string {
  return issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');
}

function runHook<T>(type: ConfigType<T>, instance: T, fieldPath: readonly string[]): void {
  if (type.validate === undefined) {
    return;
  }

  let outcome: ValidationOutcome;
  try {
    outcome = type.validate(instance);
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError(type.name, message, [], fieldPath, error);
  }

  if (isIssueList(outcome) && outcome.length > 0) {
    throw new ConfigValidationError(type.name, summarize(outcome), outcome, fieldPath);
  }
}

function validateAt<T>(
  type: ConfigType<T>,
  instance: T,
  subClasses: ReadonlySet<ConfigType<unknown>>,
  fieldPath: readonly string[]
): void {
  if (typeof instance === 'object' && instance !== null) {
    for (const field of introspect(type, subClasses).fields) {
      if (!field.isNestedConfig) {
        continue;
      }
      const value: unknown = Reflect.get(instance, field.name);
      if (typeof value === 'object' && value !== null) {
        validateAt(field.nestedType, value, subClasses, [...fieldPath, field.name]);
      }
    }
  }

  runHook(type, instance, fieldPath);
}

/**
 * Validates a config instance and all of its sub-configs.
 *
 * @example
 * ```typescript
 * const Server = defineConfig(
 *   'Server',
 *   { port: field.number() },
 *   {
 *     validate: (server) =>
 *       server.port > 0 ? [] : [{ field: 'port', value: server.port, message: 'must be positive' }],
 *   }
 * );
 * validateConfig(Server, { port: 0 }); // throws ConfigValidationError
 * ```
 *
 * @param type - The instance's config type.
 * @param instance - The instance to validate.
 * @param options - Sub-config allow-list.
 * @throws ConfigValidationError for the first failing config.
 */
export function validateConfig<T>(
  type: ConfigType<T>,
  instance: T,
  options: ValidateConfigOptions = {}
): void {
  validateAt(type, instance, new Set(options.subClasses ?? []), []);
}
