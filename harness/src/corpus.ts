/**
 * Corpus: the fixed, ordered list of problem instances the harness drives a
 * solver over. Stored as JSON; `problemsDir` is relative to the corpus file.
 */

import { readFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "@planwire/core";

const LOG_PREFIX = "planwire-harness:corpus";

export const CorpusFileSchema = z
  .object({
    problemsDir: z.string().min(1),
    extension: z.string().regex(/^[A-Za-z0-9]+$/),
    instances: z.array(z.string().regex(/^[\w.-]+$/)).min(1),
  })
  .strict();

export type CorpusFile = z.infer<typeof CorpusFileSchema>;

export interface Corpus {
  /** Absolute directory holding the instance files */
  problemsDir: string;
  extension: string;
  /** Instance names, in the order they are run */
  instances: string[];
}

/**
 * @throws ConfigurationError on an unreadable or invalid corpus file
 */
export async function loadCorpus(
  path: string,
  deps: { readFile?: (path: string) => Promise<string> } = {}
): Promise<Corpus> {
  const read = deps.readFile ?? ((p: string) => readFile(p, "utf-8"));
  let raw: unknown;
  try {
    raw = JSON.parse(await read(path));
  } catch (err) {
    throw new ConfigurationError({
      message: `${LOG_PREFIX}:loadCorpus - Cannot read corpus ${path}: ${errorMessage(err)}`,
      details: { path },
      cause: err,
    });
  }
  const parsed = CorpusFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError({
      message: `${LOG_PREFIX}:loadCorpus - Invalid corpus ${path}`,
      details: { path, errors: parsed.error.flatten() },
    });
  }
  return {
    problemsDir: resolve(dirname(path), parsed.data.problemsDir),
    extension: parsed.data.extension,
    instances: parsed.data.instances,
  };
}

/** `<problemsDir>/<name>.<extension>` */
export function locatorFor(corpus: Corpus, instance: string): string {
  return join(corpus.problemsDir, `${instance}.${corpus.extension}`);
}
