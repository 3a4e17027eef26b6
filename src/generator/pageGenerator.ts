import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { clientPaths, loadClientConfig } from "../config/clientConfig.js";
import type { GeneratorSettings } from "../config/settingsLoader.js";
import { ConfigNotFoundError, TemplateNotFoundError } from "../errors.js";
import { flatten } from "../templates/flatten.js";
import { renderPattern, substitute } from "../templates/renderer.js";
import { copyAudio } from "./assets.js";
import type { AudioCopyResult } from "./assets.js";

export interface PreviewUrls {
  local: string;
  hosted: string;
}

export interface GenerationResult {
  slug: string;
  outputPath: string;
  unresolved: string[];
  /** null when the client has no audio folder. */
  audio: AudioCopyResult | null;
  previewUrls: PreviewUrls;
}

// ---------- reporting ----------

function reportUnresolved(tokens: string[]): void {
  if (tokens.length === 0) return;
  console.warn(`[generate] Warning: ${tokens.length} unreplaced placeholder(s):`);
  for (const token of tokens) {
    console.warn(`[generate]   ${token}`);
  }
}

function reportAudio(audio: AudioCopyResult | null, expectedSource: string): void {
  if (audio) {
    console.log(`[audio] Audio copied (${audio.audioFiles} file(s)) → ${audio.destination}/`);
    return;
  }
  console.log(`[audio] Note: No audio folder found at ${expectedSource}/`);
  console.log("[audio] Add audio files there and re-run to include them.");
}

function reportDone(outputPath: string, urls: PreviewUrls): void {
  console.log(`[generate] ✓ Generated → ${outputPath}`);
  console.log(`[generate] Local preview: ${urls.local}`);
  console.log(`[generate] Hosted (after push): ${urls.hosted}`);
}

// ---------- public ----------

export function previewUrls(settings: GeneratorSettings, slug: string): PreviewUrls {
  return {
    local: renderPattern(settings.preview.localUrl, { slug }),
    hosted: renderPattern(settings.preview.hostedUrl, { slug }),
  };
}

/**
 * Build the pitch page for one client.
 *
 * Throws ConfigNotFoundError / TemplateNotFoundError before anything is
 * written. Leftover placeholders are reported and do not stop the run.
 */
export function generatePage(slug: string, settings: GeneratorSettings): GenerationResult {
  const paths = clientPaths(settings, slug);

  if (!existsSync(paths.config)) throw new ConfigNotFoundError(paths.config);
  if (!existsSync(settings.templatePath)) throw new TemplateNotFoundError(settings.templatePath);

  const mapping = flatten(loadClientConfig(paths.config));
  const template = readFileSync(settings.templatePath, "utf-8");
  const { html, unresolved } = substitute(template, mapping);
  reportUnresolved(unresolved);

  mkdirSync(paths.outputDir, { recursive: true });
  writeFileSync(paths.page, html, "utf-8");

  const audio = copyAudio(paths.audioSource, paths.audioDestination, settings.audioExtension);
  reportAudio(audio, paths.audioSource);

  const urls = previewUrls(settings, slug);
  reportDone(paths.page, urls);

  return {
    slug,
    outputPath: paths.page,
    unresolved,
    audio,
    previewUrls: urls,
  };
}
