export type GeneratorErrorCode =
  | "USAGE"
  | "CONFIG_NOT_FOUND"
  | "TEMPLATE_NOT_FOUND"
  | "SETTINGS_INVALID";

export class GeneratorError extends Error {
  readonly code: GeneratorErrorCode;

  constructor(code: GeneratorErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UsageError extends GeneratorError {
  constructor(message = "Expected exactly one client slug") {
    super("USAGE", message);
  }
}

export class ConfigNotFoundError extends GeneratorError {
  readonly path: string;

  constructor(path: string) {
    super("CONFIG_NOT_FOUND", `Config not found → ${path}`);
    this.path = path;
  }
}

export class TemplateNotFoundError extends GeneratorError {
  readonly path: string;

  constructor(path: string) {
    super("TEMPLATE_NOT_FOUND", `Template not found → ${path}`);
    this.path = path;
  }
}

/** Raised when the generator settings file fails schema validation. */
export class SettingsValidationError extends GeneratorError {
  constructor(label: string, details: string) {
    super("SETTINGS_INVALID", `[settings-validation] ${label} failed:\n  ${details}`);
  }
}
