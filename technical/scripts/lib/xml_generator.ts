import fs from 'fs-extra';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';

import { FileIoError, TemplateMissingError, ValidationError } from './errors.js';
import { outputDir, templatePath } from './paths.js';
import type { FieldDictionary } from './suggestions.js';
import { findFormatIssues } from './validators.js';
import { MANDATORY_FIELDS } from './xml_tags.js';

const LEFTOVER_PLACEHOLDER_PATTERN = /\{\{[^}]+\}\}/g;

export interface GenerateOptions {
  templatePath?: string;
  outputDir?: string;
  /** Reject malformed PAN, BSR, purpose code and DTAA rate. Defaults to true. */
  checkFormats?: boolean;
}

/** `&` goes first so the entities written afterwards are not escaped again. */
export function escapeXml(value: string | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function isPrivateField(key: string): boolean {
  return key.startsWith('_');
}

export function findMissingMandatoryFields(fields: Readonly<FieldDictionary>): string[] {
  return MANDATORY_FIELDS.filter((field) => !(fields[field] ?? '').trim());
}

export function validateRequiredFields(fields: Readonly<FieldDictionary>): void {
  const missing = findMissingMandatoryFields(fields);
  if (missing.length > 0) {
    throw new ValidationError(
      `Missing or empty mandatory fields: ${missing.join(', ')}. Fill in these fields before generating XML.`,
      missing
    );
  }
}

export function validateFieldFormats(fields: Readonly<FieldDictionary>): void {
  const issues = findFormatIssues(fields);
  if (issues.length > 0) {
    const details = issues.map((issue) => `${issue.field} '${issue.value}' (${issue.message})`);
    throw new ValidationError(
      `Malformed fields: ${details.join('; ')}`,
      issues.map((issue) => issue.field)
    );
  }
}

/**
 * Substitutes every `{{Key}}` with the escaped value and drops the tokens no
 * field supplied, so optional fields the caller left out leave empty elements.
 */
export function renderTemplate(template: string, fields: Readonly<FieldDictionary>): string {
  let xml = template;

  for (const [key, value] of Object.entries(fields)) {
    if (isPrivateField(key)) {
      continue;
    }
    xml = xml.split(`{{${key}}}`).join(escapeXml(value));
  }

  return xml.replace(LEFTOVER_PLACEHOLDER_PATTERN, '');
}

async function readTemplate(filePath: string): Promise<string> {
  if (!(await fs.pathExists(filePath))) {
    throw new TemplateMissingError(filePath);
  }

  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new FileIoError('read template', filePath, error);
  }
}

export function generatedFileName(): string {
  return `generated_${uuidv4().replace(/-/g, '').slice(0, 12)}.xml`;
}

export async function generateXml(
  fields: Readonly<FieldDictionary>,
  options: GenerateOptions = {}
): Promise<string> {
  validateRequiredFields(fields);
  if (options.checkFormats ?? true) {
    validateFieldFormats(fields);
  }

  const template = await readTemplate(options.templatePath ?? templatePath());
  const xml = renderTemplate(template, fields);

  const targetDir = options.outputDir ?? outputDir();
  const outputPath = path.join(targetDir, generatedFileName());

  try {
    await fs.ensureDir(targetDir);
    await fs.writeFile(outputPath, xml, 'utf8');
  } catch (error) {
    throw new FileIoError('write', outputPath, error);
  }

  return outputPath;
}
