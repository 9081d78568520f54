import { toPosixRelative } from './io.js';

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** Input the user can fix: missing mandatory fields or malformed codes. */
export class ValidationError extends Error {
  readonly fields: string[];

  constructor(message: string, fields: string[]) {
    super(message);
    this.name = 'ValidationError';
    this.fields = fields;
  }
}

export class TemplateMissingError extends Error {
  readonly templatePath: string;

  constructor(templatePath: string) {
    super(
      `XML template not found at ${toPosixRelative(templatePath)}. Ensure the templates directory contains form15cb_template.xml`
    );
    this.name = 'TemplateMissingError';
    this.templatePath = templatePath;
  }
}

export class FileIoError extends Error {
  readonly path: string;

  constructor(action: string, filePath: string, cause: unknown) {
    super(`Failed to ${action} ${toPosixRelative(filePath)}: ${describeCause(cause)}`, { cause });
    this.name = 'FileIoError';
    this.path = filePath;
  }
}

export class XmlParseError extends Error {
  readonly source: string;

  constructor(source: string, detail: string) {
    super(`${source}: ${detail}`);
    this.name = 'XmlParseError';
    this.source = source;
  }
}

export class ReferenceDataError extends Error {
  readonly filePath: string;

  constructor(filePath: string, detail: string) {
    super(`${toPosixRelative(filePath)}: ${detail}`);
    this.name = 'ReferenceDataError';
    this.filePath = filePath;
  }
}
