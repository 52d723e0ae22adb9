import { retrieveImage, type RetrieveResult } from "../core/pipeline.js";
import { isCloudImgError } from "../errors.js";
import { diag, silentLogger, type Logger } from "../log/diagnostics.js";
import type { Destination, ImageRequest } from "../types/image.js";
import {
  deadline,
  failureFromError,
  openSource,
  type CommandFailure,
  type ConfigOptions,
  type NetworkOptions,
} from "./common.js";

export type FetchCommandOptions = ConfigOptions &
  NetworkOptions & {
    /** Extra attempts after a retryable (network) failure. */
    retries?: number;
    logger?: Logger;
  };

export type FetchCommandResult = ({ ok: true; attempts: number } & RetrieveResult) | CommandFailure;

/**
 * Download, verify and persist one image. Only network failures are retried;
 * every attempt re-reads the manifest.
 */
export async function fetchImage(
  request: ImageRequest,
  destination: Destination,
  opts: FetchCommandOptions,
): Promise<FetchCommandResult> {
  const ctx = openSource(opts, request.distro);
  if (!ctx.ok) return ctx;

  const logger = opts.logger ?? silentLogger;
  const maxAttempts = 1 + Math.max(0, opts.retries ?? 0);

  for (let attempt = 1; ; attempt++) {
    try {
      const res = await retrieveImage(request, destination, {
        source: ctx.source,
        fetchImpl: opts.fetchImpl,
        userAgent: ctx.config.user_agent,
        signal: deadline(opts.timeoutMs),
        logger,
      });
      return { ok: true, attempts: attempt, ...res };
    } catch (e) {
      if (!isCloudImgError(e) || !e.retryable || attempt >= maxAttempts) {
        return failureFromError(e);
      }
      logger.log(
        diag("warn", "RETRYING", `Attempt ${attempt}/${maxAttempts} failed: ${e.message}`, { attempt }),
      );
    }
  }
}
