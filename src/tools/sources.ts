import * as fs from 'fs';
import * as path from 'path';
import { DATA_DIR_ENV } from '../constants.js';
import { identifiersFromFilename } from '../formats/index.js';
import { invalidParams, notFound } from '../shared/index.js';

export interface SourceParams {
  content?: string;
  path?: string;
}

export interface LoadedSource {
  text: string;
  /** Absolute path when the text came from a file. */
  path?: string;
}

function validateDirectory(dirPath: string, envName: string): string {
  if (!path.isAbsolute(dirPath)) {
    throw invalidParams(`${envName} must be an absolute path`, { env: envName, value: dirPath });
  }

  const resolved = path.resolve(dirPath);
  if (!fs.existsSync(resolved)) {
    throw invalidParams(`${envName} does not exist`, { env: envName, value: resolved });
  }

  if (!fs.statSync(resolved).isDirectory()) {
    throw invalidParams(`${envName} must point to a directory`, { env: envName, value: resolved });
  }

  return resolved;
}

export function resolveDataDirFromEnv(envName: string = DATA_DIR_ENV): string | undefined {
  const raw = process.env[envName];
  if (!raw || raw.trim().length === 0) return undefined;
  return validateDirectory(raw.trim(), envName);
}

export function resolveInputPath(filePath: string, dataDir: string | undefined): string {
  return path.resolve(dataDir ?? process.cwd(), filePath);
}

export async function loadSource(params: SourceParams, dataDir: string | undefined): Promise<LoadedSource> {
  if (params.content !== undefined) return { text: params.content };
  if (params.path === undefined) {
    throw invalidParams('Exactly one of content or path must be provided');
  }

  const resolved = resolveInputPath(params.path, dataDir);
  if (!fs.existsSync(resolved)) {
    throw notFound(`Input file not found: ${resolved}`, { path: resolved });
  }
  if (!fs.statSync(resolved).isFile()) {
    throw invalidParams(`Input path is not a file: ${resolved}`, { path: resolved });
  }

  const text = await fs.promises.readFile(resolved, 'utf-8');
  return { text, path: resolved };
}

/** Library files such as "H.cc-pVDZ.nw" name the basis set only in their file name. */
export function nameFromSource(source: LoadedSource): string | undefined {
  return source.path === undefined ? undefined : identifiersFromFilename(source.path)?.name;
}
