import { spawn } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as readline from 'readline';
import { errorMessage } from '../errors';

// Folders never worth descending into
const EXCLUDED_FOLDERS = new Set([
  'node_modules',
  '.git',
  '.svn',
  '.hg',
  '__pycache__',
  '.cache',
  '.npm',
  '.yarn',
  'venv',
  '.venv',
]);

// Maximum depth to prevent runaway walks through deep or cyclic trees
const MAX_DEPTH = 100;

/**
 * Yields candidate file paths under `roots`, never one under an exclude prefix.
 * The sequence is lazy; callers may stop early.
 */
export interface Finder {
  find(roots: string[], excludePrefixes: string[], limit?: number): Iterable<string> | AsyncIterable<string>;
}

export function isUnder(candidate: string, prefix: string): boolean {
  const relative = path.relative(path.resolve(prefix), path.resolve(candidate));
  return relative === '' || (relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative));
}

function isExcluded(candidate: string, excludePrefixes: string[]): boolean {
  return excludePrefixes.some(prefix => isUnder(candidate, prefix));
}

function shouldSkipName(name: string): boolean {
  return name.startsWith('.') || EXCLUDED_FOLDERS.has(name);
}

// Symlinked directories are never followed; a symlinked file counts as a file
function isLinkToFile(fullPath: string): boolean {
  try {
    return fs.statSync(fullPath).isFile();
  } catch (err) {
    console.warn(`[Finder] Cannot follow link ${fullPath}: ${errorMessage(err)}`);
    return false;
  }
}

export interface WalkFinderOptions {
  /** Lower-case extensions without the dot. */
  extensions?: string[];
}

interface StackEntry {
  path: string;
  depth: number;
}

/**
 * Iterative directory walk. Entries are visited in name order so repeated
 * passes over an unchanged tree yield the same sequence.
 */
export class WalkFinder implements Finder {
  private extensions: Set<string>;

  constructor(options: WalkFinderOptions = {}) {
    this.extensions = new Set((options.extensions ?? ['pdf']).map(ext => ext.toLowerCase()));
  }

  *find(roots: string[], excludePrefixes: string[], limit?: number): Generator<string> {
    if (limit !== undefined && limit <= 0) {
      return;
    }

    const seen = new Set<string>();
    let yielded = 0;

    for (const root of roots) {
      const resolvedRoot = path.resolve(root);
      if (!fs.existsSync(resolvedRoot) || isExcluded(resolvedRoot, excludePrefixes)) {
        continue;
      }

      const stack: StackEntry[] = [{ path: resolvedRoot, depth: 0 }];

      while (stack.length > 0) {
        const current = stack.pop();
        if (current === undefined) {
          break;
        }

        if (current.depth > MAX_DEPTH) {
          console.warn(`[Finder] Maximum depth exceeded: ${current.path}`);
          continue;
        }

        let entries: fs.Dirent[];
        try {
          entries = fs.readdirSync(current.path, { withFileTypes: true });
        } catch (err) {
          // Permission denied or vanished - skip this directory
          console.warn(`[Finder] Cannot read directory ${current.path}: ${err}`);
          continue;
        }
        entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

        const subdirectories: StackEntry[] = [];

        for (const entry of entries) {
          if (shouldSkipName(entry.name)) {
            continue;
          }

          const fullPath = path.join(current.path, entry.name);
          if (isExcluded(fullPath, excludePrefixes)) {
            continue;
          }

          if (entry.isDirectory()) {
            subdirectories.push({ path: fullPath, depth: current.depth + 1 });
          } else if (
            this.matchesExtension(entry.name) &&
            (entry.isFile() || (entry.isSymbolicLink() && isLinkToFile(fullPath)))
          ) {
            if (seen.has(fullPath)) {
              continue;
            }
            seen.add(fullPath);

            yield fullPath;
            yielded++;
            if (limit !== undefined && yielded >= limit) {
              return;
            }
          }
        }

        // Reverse so the stack pops subdirectories in name order
        for (let i = subdirectories.length - 1; i >= 0; i--) {
          stack.push(subdirectories[i]);
        }
      }
    }
  }

  private matchesExtension(name: string): boolean {
    const ext = path.extname(name).slice(1).toLowerCase();
    return this.extensions.has(ext);
  }
}

// ============================================================================
// Spotlight
// ============================================================================

export const MDFIND_PATH = '/usr/bin/mdfind';

const MDFIND_PDF_QUERY =
  '(kMDItemContentType == "com.adobe.pdf" || kMDItemContentTypeTree == "com.adobe.pdf" || kMDItemFSName == "*.pdf")';

export interface MdfindFinderOptions {
  /** Executable to run; defaults to the system mdfind. */
  command?: string;
}

/**
 * Asks the Spotlight index for PDFs under each root, one `mdfind -onlyin`
 * process per root. Output is consumed line by line and the process is
 * killed as soon as the limit is reached.
 */
export class MdfindFinder implements Finder {
  private command: string;

  constructor(options: MdfindFinderOptions = {}) {
    this.command = options.command ?? MDFIND_PATH;
  }

  static isAvailable(command: string = MDFIND_PATH): boolean {
    return fs.existsSync(command);
  }

  async *find(roots: string[], excludePrefixes: string[], limit?: number): AsyncGenerator<string> {
    if (limit !== undefined && limit <= 0) {
      return;
    }

    const seen = new Set<string>();
    let yielded = 0;

    for (const root of roots) {
      const resolvedRoot = path.resolve(root);
      if (!fs.existsSync(resolvedRoot) || isExcluded(resolvedRoot, excludePrefixes)) {
        continue;
      }

      const child = spawn(this.command, ['-onlyin', resolvedRoot, MDFIND_PDF_QUERY], {
        shell: false,
        stdio: ['ignore', 'pipe', 'ignore'],
      });
      const exited = new Promise<void>((resolve) => {
        child.once('close', () => resolve());
        child.once('error', (err) => {
          console.warn(`[Finder] mdfind failed for ${resolvedRoot}: ${errorMessage(err)}`);
          resolve();
        });
      });
      const lines = readline.createInterface({ input: child.stdout, crlfDelay: Infinity });

      try {
        for await (const line of lines) {
          const candidate = line.trim();
          if (candidate === '' || seen.has(candidate)) {
            continue;
          }
          seen.add(candidate);

          if (isExcluded(candidate, excludePrefixes) || !isRegularFile(candidate)) {
            continue;
          }

          yield candidate;
          yielded++;
          if (limit !== undefined && yielded >= limit) {
            return;
          }
        }
      } finally {
        lines.close();
        if (child.exitCode === null && child.signalCode === null) {
          child.kill();
        }
        await exited;
      }
    }
  }
}

function isRegularFile(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    // Index entries can outlive the file
    return false;
  }
}

export type FinderMethod = 'auto' | 'mdfind' | 'walk';

/** Spotlight where mdfind exists, the directory walk everywhere else. */
export function createFinder(method: FinderMethod, mdfindCommand: string = MDFIND_PATH): Finder {
  if (method === 'walk') {
    return new WalkFinder();
  }
  if (MdfindFinder.isAvailable(mdfindCommand)) {
    return new MdfindFinder({ command: mdfindCommand });
  }
  if (method === 'mdfind') {
    console.warn(`[Finder] ${mdfindCommand} not found, falling back to directory walk`);
  }
  return new WalkFinder();
}

/**
 * Folders a personal document collection usually lives in. Home comes last so
 * the more specific roots claim their files first.
 */
export function defaultScanRoots(home: string = os.homedir()): string[] {
  const candidates = [
    path.join(home, 'Desktop'),
    path.join(home, 'Documents'),
    path.join(home, 'Downloads'),
    path.join(home, 'Library', 'Mobile Documents', 'com~apple~CloudDocs'),
    path.join(home, 'Library', 'CloudStorage'),
  ].filter(root => fs.existsSync(root));

  return [...new Set([...candidates, home])];
}

export function defaultExcludes(home: string = os.homedir()): string[] {
  return [
    path.join(home, '.Trash'),
    path.join(home, '.cache'),
    path.join(home, 'Library', 'Caches'),
    path.join(home, 'Library', 'Containers'),
    path.join(home, 'Library', 'Group Containers'),
    path.join(home, 'Library', 'Logs'),
    path.join(home, 'Library', 'Mail'),
    path.join(home, 'Library', 'Safari'),
    path.join(home, 'Library', 'Developer'),
    '/System',
    '/private',
    '/usr',
    '/bin',
    '/sbin',
    '/proc',
  ];
}
