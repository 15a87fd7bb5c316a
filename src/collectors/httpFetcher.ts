/**
 * @fileoverview Generic JSON-over-HTTP fetcher.
 * Fills a collector's URL template from the unit key and classifies
 * failures as transient or terminal for the retry policy.
 */

import { FetchError, describeError } from "../sync/errors.js";
import type { FetchContext, Fetcher, UnitKey } from "../sync/types.js";
import type { CollectorConfig } from "../utils/config.js";

/** Statuses worth retrying: timeouts, rate limits, and server errors. */
const TRANSIENT_STATUSES = new Set([408, 425, 429]);

/**
 * Whether an HTTP status is expected to succeed on retry.
 */
export function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUSES.has(status) || status >= 500;
}

/**
 * Substitutes URL-encoded key values into `{field}` placeholders.
 * @throws FetchError (non-transient) if the key lacks a placeholder's field.
 */
export function buildUrl(template: string, unitKey: UnitKey): string {
  return template.replace(/\{([^{}]+)\}/g, (_, field: string) => {
    const value = unitKey[field];
    if (value === undefined) {
      throw new FetchError(`Unit key has no value for {${field}}`, {
        transient: false,
      });
    }
    return encodeURIComponent(value);
  });
}

/**
 * Creates a fetcher for a configured collector.
 * Resolves null for 204 responses and JSON `null` bodies (no data).
 */
export function createHttpFetcher(
  collector: Pick<CollectorConfig, "url" | "headers">
): Fetcher {
  return async (unitKey: UnitKey, context: FetchContext): Promise<unknown> => {
    const url = buildUrl(collector.url, unitKey);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { accept: "application/json", ...collector.headers },
        signal: context.signal,
      });
    } catch (error) {
      // Network failures and aborts are worth another attempt
      throw new FetchError(`Request to ${url} failed: ${describeError(error)}`, {
        transient: true,
        cause: error,
      });
    }

    if (response.status === 204) {
      return null;
    }

    if (!response.ok) {
      throw new FetchError(
        `${url} responded ${response.status} ${response.statusText}`.trim(),
        { transient: isTransientStatus(response.status), status: response.status }
      );
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw new FetchError(`Reading ${url} failed: ${describeError(error)}`, {
        transient: true,
        cause: error,
      });
    }

    try {
      return JSON.parse(body);
    } catch (error) {
      throw new FetchError(`${url} did not return valid JSON`, {
        transient: false,
        status: response.status,
        cause: error,
      });
    }
  };
}
