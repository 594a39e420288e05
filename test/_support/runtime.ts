import { readFile } from "node:fs/promises";
import type * as Library from "../../mod.ts";

export type LibraryModule = typeof Library;

export function getRepoRootUrl(): URL {
  return new URL("../../", import.meta.url);
}

export async function importLibrary(): Promise<LibraryModule> {
  return import("../../mod.ts");
}

export async function readTextFile(pathOrUrl: string | URL): Promise<string> {
  return await readFile(pathOrUrl, "utf8");
}

/**
 * Read a JSON fixture from test/fixtures; the caller's guard checks its shape.
 */
export async function readFixture<T>(
  name: string,
  guard: (value: unknown) => value is T,
): Promise<T> {
  const url = new URL(`test/fixtures/${name}`, getRepoRootUrl());
  const parsed: unknown = JSON.parse(await readTextFile(url));
  if (!guard(parsed)) {
    throw new Error(`Fixture ${name} has an unexpected shape`);
  }
  return parsed;
}
