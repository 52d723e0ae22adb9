#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { fetchImage } from "./commands/fetch.js";
import { listImages } from "./commands/list.js";
import { resolve } from "./commands/resolve.js";
import { listSources } from "./commands/sources.js";
import { validateAll } from "./commands/validate.js";
import { verifyFile } from "./commands/verify.js";
import { EXIT, exitCodeFor } from "./commands/exit-codes.js";
import type { CommandError } from "./commands/common.js";
import { createLogger, diag, type OutputFormat } from "./log/diagnostics.js";
import type { ImageRequest } from "./types/image.js";

type CommonOpts = { config?: string; env?: string; format: OutputFormat };
type RequestOpts = CommonOpts & {
  arch: string;
  variant: string;
  imageFormat: string;
  imageVersion?: string;
  timeout?: number;
};

function parseFormat(value: string): OutputFormat {
  if (value !== "human" && value !== "jsonl") {
    throw new InvalidArgumentError("expected human or jsonl");
  }
  return value;
}

function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("expected a non-negative integer");
  }
  return n;
}

function fail(format: OutputFormat, error: CommandError): never {
  createLogger(format).log(diag("error", error.code, error.message, error.details));
  process.exit(exitCodeFor(error.code));
}

function withCommon(cmd: Command): Command {
  return cmd
    .option("--config <path>", "Path to config directory (default: bundled config)")
    .option("--env <name>", "Config layer to apply over base.yaml (e.g. daily)")
    .option("--format <format>", "Output format: human|jsonl", parseFormat, "human");
}

function withRequest(cmd: Command): Command {
  return withCommon(cmd)
    .requiredOption("--arch <arch>", "Architecture (amd64, arm64, x86_64, aarch64, ...)")
    .requiredOption("--variant <variant>", "Image variant (genericcloud, nocloud, GenericCloud, ...)")
    .requiredOption("--image-format <ext>", "Image file extension (qcow2, raw, img, ...)")
    .option("--image-version <version>", "Build to pick (latest, 9.4-20240513, 24.04, ...)")
    .option("--timeout <ms>", "Deadline per attempt in milliseconds", parseNonNegativeInt);
}

function toRequest(distro: string, release: string, opts: RequestOpts): ImageRequest {
  return {
    distro: distro.toLowerCase(),
    release,
    arch: opts.arch,
    variant: opts.variant,
    format: opts.imageFormat,
    version: opts.imageVersion,
  };
}

const program = new Command();

program
  .name("cloudimgctl")
  .description("Resolve, download and verify cloud VM disk images from distribution checksum manifests")
  .version("0.1.0");

withCommon(program.command("sources"))
  .description("List configured distributions")
  .action((opts: CommonOpts) => {
    const res = listSources({ configDir: opts.config, env: opts.env });
    if (!res.ok) fail(opts.format, res.error);

    for (const s of res.sources) {
      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify(s) + "\n");
      } else {
        console.log(`${s.distro}  ${s.algorithm}  ${s.urlTemplate}${s.checksumFile}`);
      }
    }
  });

withCommon(program.command("validate"))
  .description("Validate the layered configuration")
  .action((opts: CommonOpts) => {
    const res = validateAll({ configDir: opts.config, env: opts.env });
    if (!res.ok) fail(opts.format, res.error);

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK", distros: res.distros }) + "\n");
    } else {
      console.log("OK");
    }
  });

withCommon(program.command("list"))
  .description("List images a release publishes for one architecture")
  .argument("<distro>", "Distribution (debian, ubuntu, almalinux, ...)")
  .argument("<release>", "Codename or major version")
  .requiredOption("--arch <arch>", "Architecture")
  .option("--variant <variant>", "Only this variant")
  .option("--image-format <ext>", "Only this file extension")
  .option("--image-version <version>", "Only this build")
  .option("--match <glob>", "Only filenames matching this glob")
  .option("--timeout <ms>", "Deadline in milliseconds", parseNonNegativeInt)
  .action(
    async (
      distro: string,
      release: string,
      opts: CommonOpts & {
        arch: string;
        variant?: string;
        imageFormat?: string;
        imageVersion?: string;
        match?: string;
        timeout?: number;
      },
    ) => {
      const res = await listImages(
        distro,
        release,
        {
          arch: opts.arch,
          variant: opts.variant,
          format: opts.imageFormat,
          version: opts.imageVersion,
          match: opts.match,
        },
        { configDir: opts.config, env: opts.env, timeoutMs: opts.timeout },
      );
      if (!res.ok) fail(opts.format, res.error);

      for (const a of res.assets) {
        if (opts.format === "jsonl") {
          process.stdout.write(JSON.stringify(a) + "\n");
        } else {
          console.log(`${a.filename}  ${a.fields.variant}  ${a.fields.version ?? "-"}  ${a.fields.format}  ${a.url}`);
        }
      }
    },
  );

withRequest(program.command("resolve"))
  .description("Resolve an image to its URL and expected digest without downloading")
  .argument("<distro>", "Distribution")
  .argument("<release>", "Codename or major version")
  .action(async (distro: string, release: string, opts: RequestOpts) => {
    const res = await resolve(toRequest(distro, release, opts), {
      configDir: opts.config,
      env: opts.env,
      timeoutMs: opts.timeout,
    });
    if (!res.ok) fail(opts.format, res.error);

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify(res.asset) + "\n");
    } else {
      console.log(`${res.asset.filename}\n  url:    ${res.asset.url}\n  ${res.asset.algorithm}: ${res.asset.digest}`);
    }
  });

withRequest(program.command("fetch"))
  .description("Download an image, verify its digest and write it atomically")
  .argument("<distro>", "Distribution")
  .argument("<release>", "Codename or major version")
  .requiredOption("--out <dir>", "Destination directory")
  .option("--name <filename>", "Destination filename (default: upstream filename)")
  .option("--retries <n>", "Extra attempts after a network failure", parseNonNegativeInt, 0)
  .action(
    async (distro: string, release: string, opts: RequestOpts & { out: string; name?: string; retries: number }) => {
      const res = await fetchImage(
        toRequest(distro, release, opts),
        { dir: opts.out, filename: opts.name },
        {
          configDir: opts.config,
          env: opts.env,
          timeoutMs: opts.timeout,
          retries: opts.retries,
          logger: createLogger(opts.format),
        },
      );
      if (!res.ok) fail(opts.format, res.error);

      if (opts.format === "jsonl") {
        process.stdout.write(
          JSON.stringify({ level: "info", code: "OK", path: res.path, bytes: res.bytes, digest: res.asset.digest }) +
            "\n",
        );
      } else {
        console.log(res.path);
      }
    },
  );

withCommon(program.command("verify"))
  .description("Check a local file against an expected digest")
  .argument("<file>", "File to hash")
  .requiredOption("--digest <hex>", "Expected digest")
  .option("--algorithm <name>", "Digest algorithm: md5|sha1|sha256|sha512", "sha256")
  .action(async (file: string, opts: CommonOpts & { digest: string; algorithm: string }) => {
    const res = await verifyFile(file, opts.digest, opts.algorithm);
    if (!res.ok) fail(opts.format, res.error);

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", algorithm: res.algorithm, digest: res.digest }) + "\n");
    } else {
      console.log("OK");
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.FAILED);
});
