import { ExporterBuildError } from "./errors.js";
import type { ExportProtocol, OtlpSignal } from "./types.js";

const SIGNAL_SUFFIX: Record<OtlpSignal, string> = {
  traces: "/v1/traces",
  metrics: "/v1/metrics",
};

const SCHEME = /^https?:\/\//i;

/**
 * Normalise a URL string:
 * - empty/undefined → `undefined`
 * - surrounding whitespace and trailing slashes are stripped
 *
 * No scheme is added; {@link resolveExportUrl} rejects scheme-less values.
 */
export function normalizeEndpoint(url: string | undefined): string | undefined {
  if (!url || url.trim() === "") return undefined;
  return url.trim().replace(/\/+$/, "");
}

/**
 * Validate an endpoint and return the URL the exporter should post to.
 *
 * HTTP protocols append `/v1/{signal}` when the endpoint carries no path,
 * so `http://collector:4318` becomes `http://collector:4318/v1/metrics`.
 * gRPC endpoints are returned without a path suffix.
 *
 * @throws {ExporterBuildError} when the endpoint is empty, has no
 *   `http://`/`https://` scheme, or does not parse as a URL.
 */
export function resolveExportUrl(
  endpoint: string,
  signal: OtlpSignal,
  protocol: ExportProtocol,
): string {
  const normalized = normalizeEndpoint(endpoint);
  if (!normalized) {
    throw new ExporterBuildError(signal, endpoint, "endpoint is empty");
  }
  if (!SCHEME.test(normalized)) {
    throw new ExporterBuildError(
      signal,
      endpoint,
      "endpoint must start with http:// or https://",
    );
  }

  let parsed: URL;
  try {
    parsed = new URL(normalized);
  } catch (err) {
    throw new ExporterBuildError(signal, endpoint, "endpoint is not a valid URL", {
      cause: err,
    });
  }
  if (!parsed.hostname) {
    throw new ExporterBuildError(signal, endpoint, "endpoint has no host");
  }

  if (protocol === "grpc") return normalized;

  const hasPath = parsed.pathname !== "" && parsed.pathname !== "/";
  return hasPath ? normalized : `${normalized}${SIGNAL_SUFFIX[signal]}`;
}
