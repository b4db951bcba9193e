import {
  ObservabilityConfigSchema,
  ServiceIdentitySchema,
  type ObservabilityConfig,
  type ObservabilityConfigInput,
  type ServiceIdentity,
  type ServiceIdentityInput
} from "@vigil/contracts";
import { ValidationError } from "./errors.js";

/**
 * Validate and freeze a service identity.
 *
 * Only the name (non-empty) and the environment (one of the declared values)
 * are checked; everything else is taken as given.
 *
 * @throws {ValidationError} If the name is empty or the environment is unknown.
 */
export function createServiceIdentity(input: ServiceIdentityInput): Readonly<ServiceIdentity> {
  const result = ServiceIdentitySchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(result.error.issues);
  }

  return Object.freeze({
    ...result.data,
    attributes: Object.freeze({ ...result.data.attributes })
  });
}

/**
 * Merge a partial configuration tree over the defaults. The result is a fresh
 * object, so later changes to `input` do not reach it. Numbers are not range
 * checked, but a value of the wrong type is rejected.
 *
 * @throws {ValidationError} If a field has the wrong type or an unknown enum value.
 */
export function resolveConfig(input: ObservabilityConfigInput = {}): ObservabilityConfig {
  const result = ObservabilityConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(result.error.issues, "configuration");
  }
  return result.data;
}
