export type WorkbookPatchErrorCode =
  | "InputNotFound"
  | "ArchiveError"
  | "SheetNotFoundError"
  | "RelationshipError"
  | "MissingHeaderRowError"
  | "MissingColumnError"
  | "SerializationError"
  | "DateParseError";

/** Base class for every failure the patcher reports to the operator. */
export class WorkbookPatchError extends Error {
  readonly code: WorkbookPatchErrorCode;

  constructor(code: WorkbookPatchErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InputNotFoundError extends WorkbookPatchError {
  readonly path: string;

  constructor(path: string) {
    super("InputNotFound", `Workbook '${path}' does not exist`);
    this.path = path;
  }
}

export class ArchiveError extends WorkbookPatchError {
  constructor(message: string, options?: ErrorOptions) {
    super("ArchiveError", message, options);
  }
}

/** A container member that should hold XML could not be parsed. */
export class MalformedXmlError extends ArchiveError {
  readonly member: string;

  constructor(member: string, detail: string) {
    super(`Member '${member}' is not well-formed XML: ${detail}`);
    this.member = member;
  }
}

export class SheetNotFoundError extends WorkbookPatchError {
  readonly sheetName: string;
  readonly available: string[];

  constructor(sheetName: string, available: string[]) {
    const listed = available.map((n) => `'${n}'`).join(", ");
    super(
      "SheetNotFoundError",
      `Worksheet '${sheetName}' not found. Available: [${listed}]`
    );
    this.sheetName = sheetName;
    this.available = available;
  }
}

export class RelationshipError extends WorkbookPatchError {
  constructor(message: string) {
    super("RelationshipError", message);
  }
}

export class MissingHeaderRowError extends WorkbookPatchError {
  constructor(message = "Worksheet is missing a header row") {
    super("MissingHeaderRowError", message);
  }
}

export class MissingColumnError extends WorkbookPatchError {
  readonly missing: string[];

  constructor(missing: string[], expected: string[]) {
    const quoted = expected.map((h) => `'${h}'`).join(" and ");
    super(
      "MissingColumnError",
      `Required headers not found. Expected ${quoted}; missing: ${missing.join(", ")}`
    );
    this.missing = missing;
  }
}

export class SerializationError extends WorkbookPatchError {
  constructor(message: string, options?: ErrorOptions) {
    super("SerializationError", message, options);
  }
}

export class DateParseError extends WorkbookPatchError {
  readonly input: string;
  readonly pattern: string;

  constructor(input: string, pattern: string, reason: string) {
    super("DateParseError", `Cannot parse '${input}' with format '${pattern}': ${reason}`);
    this.input = input;
    this.pattern = pattern;
  }
}
