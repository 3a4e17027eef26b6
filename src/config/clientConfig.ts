import { readFileSync } from "node:fs";
import { join } from "node:path";
import type { GeneratorSettings } from "./settingsLoader.js";
import { isConfigDocument } from "../templates/flatten.js";
import type { ConfigDocument } from "../templates/flatten.js";

export interface ClientPaths {
  config: string;
  audioSource: string;
  outputDir: string;
  page: string;
  audioDestination: string;
}

export function clientPaths(settings: GeneratorSettings, slug: string): ClientPaths {
  const outputDir = join(settings.outputRoot, slug);
  return {
    config: join(settings.configsDir, `${slug}${settings.configExtension}`),
    audioSource: join(settings.configsDir, slug, settings.audioDirname),
    outputDir,
    page: join(outputDir, settings.pageFilename),
    audioDestination: join(outputDir, settings.audioDirname),
  };
}

/**
 * Read a client config. Malformed JSON or a non-object top level throws;
 * there is no schema for the values themselves.
 */
export function loadClientConfig(path: string): ConfigDocument {
  const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
  if (!isConfigDocument(parsed)) {
    throw new Error(`[config] ${path} must contain a JSON object at the top level`);
  }
  return parsed;
}
