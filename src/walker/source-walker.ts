import { createHash } from "node:crypto";
import type { Dirent, Stats } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import { join, relative, resolve, sep } from "node:path";
import ignore from "ignore";
import type { ReviewUnit } from "../review/types.js";
import { languageForPath, type Language } from "./languages.js";
import { compareStrings } from "../utils/compare.js";
import { ConfigError, errorMessage } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "source-walker" });

export interface WalkOptions {
  languages: readonly Language[];
  /** gitignore-style patterns, relative to the root. */
  excludePaths?: readonly string[];
  maxFileSizeKB?: number;
}

/**
 * Restartable sequence of ReviewUnits under a root. Each iteration lists the
 * whole tree up front, then reads files one at a time as their unit is
 * reached, in lexicographic path order. Unreadable paths are logged and skipped.
 */
export class SourceWalker implements AsyncIterable<ReviewUnit> {
  readonly root: string;
  private readonly languages: ReadonlySet<Language>;
  private readonly ignorer: ReturnType<typeof ignore>;
  private readonly maxBytes: number;

  constructor(root: string, opts: WalkOptions) {
    this.root = resolve(root);
    this.languages = new Set(opts.languages);
    this.ignorer = ignore().add([...(opts.excludePaths ?? [])]);
    this.maxBytes = (opts.maxFileSizeKB ?? 200) * 1024;
  }

  [Symbol.asyncIterator](): AsyncIterator<ReviewUnit> {
    return this.walk();
  }

  /** Relative paths of every file the walk would read, sorted. */
  async listPaths(): Promise<string[]> {
    const found: string[] = [];
    await this.collect(this.root, found);
    return found.sort(compareStrings);
  }

  private async *walk(): AsyncGenerator<ReviewUnit> {
    const paths = await this.listPaths();
    log.debug({ root: this.root, files: paths.length }, "Source tree listed");

    for (const path of paths) {
      const unit = await this.readUnit(path);
      if (unit) yield unit;
    }
  }

  private async collect(dir: string, found: string[]): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      log.warn({ dir, err: errorMessage(err) }, "Skipping unreadable directory");
      return;
    }

    for (const entry of entries) {
      const absolute = join(dir, entry.name);
      const rel = toPosix(relative(this.root, absolute));

      let isDir = entry.isDirectory();
      let isFile = entry.isFile();
      if (entry.isSymbolicLink()) {
        // Follow links to files only; linked directories could cycle.
        try {
          isFile = (await stat(absolute)).isFile();
        } catch (err) {
          log.warn({ path: rel, err: errorMessage(err) }, "Skipping broken symlink");
          continue;
        }
        isDir = false;
      }

      if (isDir) {
        if (this.ignorer.ignores(`${rel}/`)) continue;
        await this.collect(absolute, found);
      } else if (isFile) {
        if (this.ignorer.ignores(rel)) continue;
        const language = languageForPath(rel);
        if (language && this.languages.has(language)) found.push(rel);
      }
    }
  }

  private async readUnit(path: string): Promise<ReviewUnit | null> {
    const absolutePath = join(this.root, path);
    const language = languageForPath(path);
    if (!language) return null;

    try {
      const info = await stat(absolutePath);
      if (info.size > this.maxBytes) {
        log.warn(
          { path, sizeKB: Math.round(info.size / 1024), maxKB: this.maxBytes / 1024 },
          "Skipping file above size limit"
        );
        return null;
      }
      const content = await readFile(absolutePath, "utf-8");
      return createReviewUnit(path, absolutePath, language, content);
    } catch (err) {
      log.warn({ path, err: errorMessage(err) }, "Skipping unreadable file");
      return null;
    }
  }
}

export function createReviewUnit(
  path: string,
  absolutePath: string,
  language: Language,
  content: string
): ReviewUnit {
  return Object.freeze({
    path,
    absolutePath,
    language,
    hash: createHash("sha256").update(content).digest("hex"),
    lines: Object.freeze(splitLines(content)),
  });
}

export function splitLines(content: string): string[] {
  if (content === "") return [];
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * @throws ConfigError when the root is missing or not a directory
 */
export async function assertReviewRoot(root: string): Promise<string> {
  const absolute = resolve(root);
  let info: Stats;
  try {
    info = await stat(absolute);
  } catch (err) {
    throw new ConfigError(`Source root not found: ${root}`, { cause: err });
  }
  if (!info.isDirectory()) {
    throw new ConfigError(`Source root is not a directory: ${root}`);
  }
  return absolute;
}

function toPosix(path: string): string {
  return sep === "/" ? path : path.split(sep).join("/");
}
