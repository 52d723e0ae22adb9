import { resolveImage } from "../core/pipeline.js";
import type { Logger } from "../log/diagnostics.js";
import type { ImageAsset, ImageRequest } from "../types/image.js";
import {
  deadline,
  failureFromError,
  openSource,
  type CommandFailure,
  type ConfigOptions,
  type NetworkOptions,
} from "./common.js";

export type ResolveCommandResult = { ok: true; asset: ImageAsset } | CommandFailure;

/**
 * Resolve a request to its download URL and expected digest without downloading.
 */
export async function resolve(
  request: ImageRequest,
  opts: ConfigOptions & NetworkOptions & { logger?: Logger },
): Promise<ResolveCommandResult> {
  const ctx = openSource(opts, request.distro);
  if (!ctx.ok) return ctx;

  try {
    const { asset } = await resolveImage(request, {
      source: ctx.source,
      fetchImpl: opts.fetchImpl,
      userAgent: ctx.config.user_agent,
      signal: deadline(opts.timeoutMs),
      logger: opts.logger,
    });
    return { ok: true, asset };
  } catch (e) {
    return failureFromError(e);
  }
}
