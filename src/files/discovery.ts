/**
 * File discovery: walks a project tree and applies include, ignore and
 * .gitignore patterns.
 */

import * as fs from "fs";
import * as path from "path";
import { minimatch } from "minimatch";
import { FileAccessError } from "../errors";
import { logger, errorMessage } from "../logger";

export interface DiscoveryOptions {
  /** Glob patterns a file must match; a pattern without "/" matches the basename */
  include: readonly string[];
  /** Glob patterns for files and directories to skip */
  ignore: readonly string[];
  respectGitignore: boolean;
}

/**
 * Directories never worth walking.
 */
export const ALWAYS_IGNORED_DIRS = new Set([
  ".git",
  ".hg",
  ".svn",
  "node_modules",
  "__pycache__",
  ".venv",
  "venv",
  "env",
  ".tox",
  ".mypy_cache",
  ".pytest_cache",
  "dist",
  "build",
  "coverage",
]);

export function toPosix(filePath: string): string {
  return filePath.split(path.sep).join("/");
}

function matchesPattern(relativePath: string, pattern: string): boolean {
  const anchored = pattern.startsWith("/");
  const cleaned = anchored ? pattern.slice(1) : pattern;
  return minimatch(relativePath, cleaned, { dot: true, matchBase: !anchored && !cleaned.includes("/") });
}

export function matchesAny(relativePath: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => matchesPattern(relativePath, pattern));
}

interface GitignoreRule {
  pattern: string;
  directoryOnly: boolean;
}

/**
 * Parse .gitignore lines. Negations are not supported and are skipped.
 */
export function parseGitignore(text: string): GitignoreRule[] {
  const rules: GitignoreRule[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#") || line.startsWith("!")) continue;
    const directoryOnly = line.endsWith("/");
    const pattern = directoryOnly ? line.slice(0, -1) : line;
    if (pattern) {
      // A slash inside the pattern anchors it to the root
      rules.push({ pattern: pattern.includes("/") && !pattern.startsWith("/") ? `/${pattern}` : pattern, directoryOnly });
    }
  }
  return rules;
}

function gitignored(relativePath: string, isDirectory: boolean, rules: readonly GitignoreRule[]): boolean {
  return rules.some((rule) => (isDirectory || !rule.directoryOnly) && matchesPattern(relativePath, rule.pattern));
}

async function loadGitignore(root: string): Promise<GitignoreRule[]> {
  try {
    return parseGitignore(await fs.promises.readFile(path.join(root, ".gitignore"), "utf-8"));
  } catch (err) {
    logger.debug("No readable .gitignore", { root, error: errorMessage(err) });
    return [];
  }
}

/**
 * List candidate files under `root`, sorted and without duplicates.
 * Paths are absolute. A file given as root is returned alone when it
 * passes the filters.
 */
export async function discoverFiles(root: string, options: DiscoveryOptions): Promise<string[]> {
  const absoluteRoot = path.resolve(root);
  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(absoluteRoot);
  } catch (err) {
    throw new FileAccessError(`Cannot access project path: ${errorMessage(err)}`, absoluteRoot);
  }

  const accepts = (relativePath: string) =>
    (options.include.length === 0 || matchesAny(relativePath, options.include)) &&
    !matchesAny(relativePath, options.ignore);

  if (stat.isFile()) {
    return accepts(path.basename(absoluteRoot)) ? [absoluteRoot] : [];
  }

  const gitignoreRules = options.respectGitignore ? await loadGitignore(absoluteRoot) : [];
  const found = new Set<string>();

  const walk = async (directory: string): Promise<void> => {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(directory, { withFileTypes: true });
    } catch (err) {
      if (directory === absoluteRoot) {
        throw new FileAccessError(`Cannot list project path: ${errorMessage(err)}`, directory);
      }
      logger.warn("Skipping unreadable directory", { directory, error: errorMessage(err) });
      return;
    }

    for (const entry of entries) {
      const absolute = path.join(directory, entry.name);
      const relative = toPosix(path.relative(absoluteRoot, absolute));

      if (entry.isDirectory()) {
        if (ALWAYS_IGNORED_DIRS.has(entry.name)) continue;
        if (matchesAny(relative, options.ignore) || gitignored(relative, true, gitignoreRules)) continue;
        await walk(absolute);
      } else if (entry.isFile()) {
        if (gitignored(relative, false, gitignoreRules)) continue;
        if (accepts(relative)) {
          found.add(absolute);
        }
      }
    }
  };

  await walk(absoluteRoot);
  return [...found].sort();
}
