/**
 * Browser runtime bundle.
 *
 * Bundles `yoguido-client/browser` into a single IIFE with esbuild the first
 * time it is requested and keeps the result for the life of the process.
 */

import { createRequire } from "node:module";
import { build } from "esbuild";
import { Logger } from "yoguido-kernel";
import { TransportError } from "yoguido-shared";

export interface ClientBundleOptions {
  /** Entry module; defaults to the installed `yoguido-client/browser` */
  entry?: string;
  minify?: boolean;
}

/**
 * Source of the script served at `<basePath>/client.js`.
 */
export type ClientScriptSource = string | (() => Promise<string>);

export function resolveClientEntry(): string {
  return createRequire(import.meta.url).resolve("yoguido-client/browser");
}

export async function bundleClient(options: ClientBundleOptions = {}): Promise<string> {
  const entry = options.entry ?? resolveClientEntry();
  const started = Date.now();
  const result = await build({
    entryPoints: [entry],
    bundle: true,
    format: "iife",
    platform: "browser",
    target: "es2020",
    minify: options.minify ?? true,
    write: false,
    logLevel: "silent",
  });
  const output = result.outputFiles?.[0];
  if (!output) {
    throw new TransportError("response", `esbuild produced no output for ${entry}`);
  }
  Logger.for("client-bundle").info(
    { entry, bytes: output.contents.byteLength, ms: Date.now() - started },
    "client bundle built",
  );
  return output.text;
}

/**
 * Memoize a script source. A failed build is not cached, so the next
 * request retries.
 */
export function cachedScript(source: ClientScriptSource): () => Promise<string> {
  if (typeof source === "string") {
    return () => Promise.resolve(source);
  }
  let pending: Promise<string> | null = null;
  return () => {
    if (!pending) {
      pending = source().catch((error: unknown) => {
        pending = null;
        throw error;
      });
    }
    return pending;
  };
}
