/**
 * Fixture discovery: one sample document and one expected table per target
 */

import { existsSync, readdirSync, statSync } from "fs";
import { extname, join } from "path";
import { MissingFixtureError } from "./errors";
import { Fixture } from "./types";

export const DOCUMENT_EXTENSION = ".pdf";
export const TABLE_EXTENSION = ".csv";

export function normalizeTarget(raw: string): string {
  return raw.trim().toLowerCase();
}

/**
 * Resolve `<dataDir>/<target>/` to its first PDF and first CSV, in directory
 * listing order.
 */
export function locateFixture(dataDir: string, target: string): Fixture {
  const folder = join(dataDir, target);
  if (!target || !existsSync(folder) || !statSync(folder).isDirectory()) {
    throw new MissingFixtureError(`Missing fixture directory ${folder}`);
  }

  const files = readdirSync(folder).filter((name) => statSync(join(folder, name)).isFile());
  const document = files.find((name) => extname(name).toLowerCase() === DOCUMENT_EXTENSION);
  const table = files.find((name) => extname(name).toLowerCase() === TABLE_EXTENSION);

  if (!document || !table) {
    throw new MissingFixtureError(`Missing PDF or CSV in ${folder}`);
  }

  return {
    target,
    documentPath: join(folder, document),
    tablePath: join(folder, table),
  };
}
