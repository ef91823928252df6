export class DeckAugmentError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = "DeckAugmentError";
  }
}

// ---- Package container ----

export class PackageNotFoundError extends DeckAugmentError {
  constructor(packagePath: string) {
    super(`Package not found: ${packagePath}`, "PACKAGE_NOT_FOUND");
    this.name = "PackageNotFoundError";
  }
}

export class InvalidContainerError extends DeckAugmentError {
  constructor(packagePath: string, cause: string) {
    super(`'${packagePath}' is not a valid package archive: ${cause}`, "INVALID_CONTAINER");
    this.name = "InvalidContainerError";
  }
}

export class MissingPayloadError extends DeckAugmentError {
  constructor(packagePath: string) {
    super(
      `'${packagePath}' contains neither collection.anki21b nor collection.anki2.`,
      "MISSING_PAYLOAD",
    );
    this.name = "MissingPayloadError";
  }
}

// ---- Schema ----

export class NoteTypeNotFoundError extends DeckAugmentError {
  constructor(name: string) {
    super(`Could not find note type with name '${name}'.`, "NOTE_TYPE_NOT_FOUND");
    this.name = "NoteTypeNotFoundError";
  }
}

export class FieldNotFoundError extends DeckAugmentError {
  constructor(
    public readonly field: string,
    noteType: string,
    available: readonly string[],
  ) {
    super(
      `Target field '${field}' not found in note type '${noteType}'. ` +
        `Available fields: ${formatFieldList(available)}`,
      "FIELD_NOT_FOUND",
    );
    this.name = "FieldNotFoundError";
  }
}

export class MissingSourceFieldError extends DeckAugmentError {
  constructor(
    public readonly field: string,
    available: readonly string[],
  ) {
    super(
      `Required field '${field}' (from prompt) not found. Available fields: ${formatFieldList(available)}`,
      "MISSING_SOURCE_FIELD",
    );
    this.name = "MissingSourceFieldError";
  }
}

// ---- Generation ----

export class MissingCredentialsError extends DeckAugmentError {
  constructor(variable: string) {
    super(`${variable} environment variable not set.`, "MISSING_CREDENTIALS");
    this.name = "MissingCredentialsError";
  }
}

export class GenerationTimeoutError extends DeckAugmentError {
  constructor(timeoutMs: number) {
    super(`Generation timed out after ${timeoutMs}ms`, "GENERATION_TIMEOUT");
    this.name = "GenerationTimeoutError";
  }
}

// ---- Live mode ----

export class RemoteUnreachableError extends DeckAugmentError {
  constructor(url: string) {
    super(
      `Could not connect to AnkiConnect at ${url}. Is Anki running and AnkiConnect installed?`,
      "REMOTE_UNREACHABLE",
    );
    this.name = "RemoteUnreachableError";
  }
}

export class AnkiConnectError extends DeckAugmentError {
  constructor(action: string, message: string) {
    super(`AnkiConnect '${action}' failed: ${message}`, "ANKI_CONNECT_ERROR");
    this.name = "AnkiConnectError";
  }
}

// ---- Configuration ----

export class ConfigurationError extends DeckAugmentError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
  }
}

export class FileReadError extends DeckAugmentError {
  constructor(filePath: string, cause: string) {
    super(`Failed to read file '${filePath}': ${cause}`, "FILE_READ_ERROR");
    this.name = "FileReadError";
  }
}

function formatFieldList(fields: readonly string[]): string {
  return fields.length > 0 ? fields.join(", ") : "(none)";
}
