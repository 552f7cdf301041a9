import {
  defaultResource,
  resourceFromAttributes,
  type Resource,
} from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions";
import { ConfigurationError } from "./errors.js";
import { readEnv } from "./env.js";
import type { EnvMap } from "./types.js";

/** Service identity attached to every exported metric and span. */
export interface ResourceDescriptor {
  readonly serviceName: string;
  readonly serviceVersion?: string;
}

/**
 * Create a frozen {@link ResourceDescriptor}.
 *
 * @throws {ConfigurationError} when `serviceName` is blank.
 */
export function createResourceDescriptor(
  serviceName: string,
  serviceVersion?: string,
): ResourceDescriptor {
  const name = serviceName.trim();
  if (name === "") {
    throw new ConfigurationError("service name must not be empty");
  }
  const version = serviceVersion?.trim();
  return Object.freeze(version ? { serviceName: name, serviceVersion: version } : { serviceName: name });
}

/**
 * Parse `OTEL_RESOURCE_ATTRIBUTES` from a flat env map.
 *
 * `service.name` and `service.version` are dropped: the descriptor owns them.
 */
export function parseEnvResourceAttributes(env?: EnvMap): Record<string, string> {
  const attrs: Record<string, string> = {};

  const raw = readEnv("OTEL_RESOURCE_ATTRIBUTES", env);
  if (!raw) return attrs;

  for (const pair of raw.split(",")) {
    const idx = pair.indexOf("=");
    if (idx <= 0) continue;
    const key = pair.slice(0, idx).trim();
    const value = pair.slice(idx + 1).trim();
    if (!key || key === ATTR_SERVICE_NAME || key === ATTR_SERVICE_VERSION) continue;
    try {
      attrs[key] = decodeURIComponent(value);
    } catch {
      // Malformed percent-encoding: keep the raw value.
      attrs[key] = value;
    }
  }

  return attrs;
}

/**
 * Build the OpenTelemetry {@link Resource} for a descriptor.
 *
 * Merge order (later wins):
 * 1. OTel default resource (SDK info + `unknown_service:node`)
 * 2. `OTEL_RESOURCE_ATTRIBUTES`
 * 3. Caller-provided `extraAttributes`
 * 4. `service.name` / `service.version` from the descriptor
 */
export function buildResource(
  descriptor: ResourceDescriptor,
  extraAttributes?: Record<string, string>,
  env?: EnvMap,
): Resource {
  const identity: Record<string, string> = {
    [ATTR_SERVICE_NAME]: descriptor.serviceName,
  };
  if (descriptor.serviceVersion) {
    identity[ATTR_SERVICE_VERSION] = descriptor.serviceVersion;
  }

  return defaultResource()
    .merge(resourceFromAttributes(parseEnvResourceAttributes(env)))
    .merge(resourceFromAttributes({ ...extraAttributes }))
    .merge(resourceFromAttributes(identity));
}
