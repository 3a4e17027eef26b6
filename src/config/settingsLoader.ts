import { existsSync, readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { createRequire } from "node:module";
import { parse as parseYaml } from "yaml";
import { Ajv2020 } from "ajv/dist/2020.js";
import type { SchemaObject } from "ajv";
import type { FormatsPlugin } from "ajv-formats";
import { SettingsValidationError } from "../errors.js";

const require = createRequire(import.meta.url);

// ajv-formats is CJS with only a default export; require gives the plugin function itself
const addFormats: FormatsPlugin = require("ajv-formats");

// ---------- paths ----------

export const PACKAGE_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), "..", "..");
const SCHEMA_PATH = resolve(PACKAGE_ROOT, "settings", "schemas", "generator.schema.json");
const SETTINGS_RELATIVE = ["settings", "generator.yaml"] as const;

// ---------- helpers ----------

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, "utf-8"));
}

function readYaml(path: string): unknown {
  return parseYaml(readFileSync(path, "utf-8"));
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ---------- types ----------

/** Shape of settings/generator.yaml as written on disk. */
export interface SettingsDocument {
  paths: {
    configs_dir: string;
    config_extension: string;
    template: string;
    output_root: string;
    page_filename: string;
    audio_dirname: string;
  };
  audio: { extension: string };
  preview: { local_url: string; hosted_url: string };
}

export interface GeneratorSettings {
  /** Base directory every relative path below was resolved against. */
  root: string;
  configsDir: string;
  configExtension: string;
  templatePath: string;
  outputRoot: string;
  pageFilename: string;
  audioDirname: string;
  audioExtension: string;
  preview: {
    localUrl: string;
    hostedUrl: string;
  };
}

export interface LoadSettingsOptions {
  root?: string;
  settingsPath?: string;
  env?: NodeJS.ProcessEnv;
}

// ---------- validation ----------

function validateSettings(data: unknown, label: string): SettingsDocument {
  const schema = readJson(SCHEMA_PATH);
  if (!isSchemaObject(schema)) {
    throw new Error(`[settings] Schema at ${SCHEMA_PATH} is not a JSON object`);
  }

  const ajv = new Ajv2020({ allErrors: true, strict: false });
  addFormats(ajv);

  const validate = ajv.compile<SettingsDocument>(schema);
  if (!validate(data)) {
    throw new SettingsValidationError(label, ajv.errorsText(validate.errors, { separator: "\n  " }));
  }
  return data;
}

/**
 * The settings file is looked up in this order: an explicit path (option or
 * PITCHDECK_SETTINGS), `settings/generator.yaml` under the root, then the copy
 * shipped with the package.
 */
function locateSettings(root: string, explicit: string | undefined): string {
  if (explicit) return resolve(root, explicit);
  const local = resolve(root, ...SETTINGS_RELATIVE);
  return existsSync(local) ? local : resolve(PACKAGE_ROOT, ...SETTINGS_RELATIVE);
}

function applyEnvOverrides(data: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!isRecord(data) || !isRecord(data.preview)) return data;

  const preview: Record<string, unknown> = { ...data.preview };
  if (env.PITCHDECK_LOCAL_URL) preview.local_url = env.PITCHDECK_LOCAL_URL;
  if (env.PITCHDECK_HOSTED_URL) preview.hosted_url = env.PITCHDECK_HOSTED_URL;
  return { ...data, preview };
}

// ---------- public ----------

export function loadSettings(options: LoadSettingsOptions = {}): GeneratorSettings {
  const env = options.env ?? process.env;
  const root = resolve(options.root ?? env.PITCHDECK_ROOT ?? PACKAGE_ROOT);
  const settingsPath = locateSettings(root, options.settingsPath ?? env.PITCHDECK_SETTINGS);

  const raw = applyEnvOverrides(readYaml(settingsPath), env);
  const doc = validateSettings(raw, settingsPath);

  return {
    root,
    configsDir: resolve(root, doc.paths.configs_dir),
    configExtension: doc.paths.config_extension,
    templatePath: resolve(root, doc.paths.template),
    outputRoot: resolve(root, doc.paths.output_root),
    pageFilename: doc.paths.page_filename,
    audioDirname: doc.paths.audio_dirname,
    audioExtension: doc.audio.extension,
    preview: {
      localUrl: doc.preview.local_url,
      hostedUrl: doc.preview.hosted_url,
    },
  };
}
