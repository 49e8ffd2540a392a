import * as fs from 'fs';
import * as path from 'path';
import { loadWorldWithReport, WorldLoadError, type ValidationReport, type World } from '@text-adventure/runtime';

/**
 * Reads and loads a world document from disk.
 * Missing files and invalid JSON are reported as WorldLoadError too.
 */
export function readWorldFile(filePath: string): { world: World; report: ValidationReport } {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new WorldLoadError([`World file not found: ${filePath}`]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new WorldLoadError([`${filePath} is not valid JSON: ${reason}`]);
  }

  return loadWorldWithReport(raw);
}

/**
 * Reads a walkthrough script: one command per line, blank lines and lines
 * starting with # are skipped. Commands are trimmed and case-folded.
 */
export function readScriptFile(filePath: string): string[] {
  return parseScript(fs.readFileSync(path.resolve(filePath), 'utf-8'));
}

export function parseScript(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim().toLowerCase())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * Parses "0,1,2" (spaces allowed) into location ids.
 */
export function parseIdList(text: string): number[] {
  const ids = text
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => Number(part));

  const bad = ids.findIndex((id) => !Number.isInteger(id) || id < 0);
  if (bad !== -1) {
    throw new Error(`Invalid location id list: "${text}"`);
  }
  return ids;
}
