import { repoPath } from './io.js';

export function masterDataPath(): string {
  return repoPath('data', 'master', 'master_data.json');
}

export function aliasesPath(): string {
  return repoPath('data', 'master', 'aliases.json');
}

export function bankCodesPath(): string {
  return repoPath('lookups', 'bank_codes.json');
}

export function natureCodesPath(): string {
  return repoPath('lookups', 'nature_codes.json');
}

export function natureCodesFullPath(): string {
  return repoPath('lookups', 'nature_codes_full.json');
}

export function templatePath(): string {
  return repoPath('templates', 'form15cb_template.xml');
}

export function outputDir(): string {
  return repoPath('data', 'output');
}
