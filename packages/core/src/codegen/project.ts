/**
 * Project Writer
 * Packages generated code as a runnable Node.js project directory
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { fileURLToPath } from 'node:url';

const TEMPLATE_DIR = fileURLToPath(new URL('../../templates/', import.meta.url));

const PACKAGE_TEMPLATE = 'package.json.TEMPLATE';
const README_TEMPLATE = 'README.md.TEMPLATE';

export interface ProjectOptions {
  /** File name of the original program, as written into the project */
  readonly sourceName: string;
  readonly sourceText: string;
  /** Generated module written to src/main.js */
  readonly code: string;
  /** Defaults to the output directory's name */
  readonly packageName?: string | undefined;
  /** RFC 3339 timestamp; defaults to now, to the second */
  readonly timestamp?: string | undefined;
}

export interface Replacements {
  readonly packageName: string;
  readonly sourceFilename: string;
  readonly sourceCode: string;
  readonly timestamp: string;
}

/**
 * Fill `%%NAME%%` placeholders in one pass, so placeholder-like text inside
 * the substituted source code is left alone. `escape` is applied to every
 * substituted value.
 */
export function fillTemplate(
  template: string,
  values: Replacements,
  escape: (value: string) => string = (value) => value
): string {
  return template.replace(
    /%%(PACKAGE_NAME|SOURCE_FILENAME|SOURCE_CODE|TIMESTAMP)%%/g,
    (_match, key: string) => {
      switch (key) {
        case 'PACKAGE_NAME':
          return escape(values.packageName);
        case 'SOURCE_FILENAME':
          return escape(values.sourceFilename);
        case 'SOURCE_CODE':
          return escape(values.sourceCode);
        default:
          return escape(values.timestamp);
      }
    }
  );
}

/** Body of a JSON string literal, for placeholders inside quotes */
export function escapeJsonString(value: string): string {
  return JSON.stringify(value).slice(1, -1);
}

/** Lowercase npm-safe package name derived from a directory name */
export function toPackageName(name: string): string {
  const cleaned = name
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, '-')
    .replace(/^[._-]+|[-]+$/g, '');
  return cleaned === '' ? 'generated-program' : cleaned;
}

/**
 * Write package.json, README.md, the original program and src/main.js into
 * `dir`, creating it as needed. Returns the written paths.
 */
export async function writeProject(
  dir: string,
  options: ProjectOptions
): Promise<string[]> {
  const values: Replacements = {
    packageName: toPackageName(options.packageName ?? basename(dir)),
    sourceFilename: options.sourceName,
    sourceCode: options.sourceText,
    timestamp:
      options.timestamp ?? new Date().toISOString().replace(/\.\d{3}Z$/, 'Z'),
  };

  await mkdir(join(dir, 'src'), { recursive: true });

  const [packageTemplate, readmeTemplate] = await Promise.all([
    readFile(join(TEMPLATE_DIR, PACKAGE_TEMPLATE), 'utf8'),
    readFile(join(TEMPLATE_DIR, README_TEMPLATE), 'utf8'),
  ]);

  const written = {
    manifest: join(dir, 'package.json'),
    readme: join(dir, 'README.md'),
    source: join(dir, basename(options.sourceName)),
    main: join(dir, 'src', 'main.js'),
  };

  await writeFile(
    written.manifest,
    fillTemplate(packageTemplate, values, escapeJsonString)
  );
  await writeFile(written.readme, fillTemplate(readmeTemplate, values));
  await writeFile(written.source, options.sourceText);
  await writeFile(written.main, options.code);

  return [written.manifest, written.readme, written.source, written.main];
}
