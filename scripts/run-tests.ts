import { spawnSync } from 'node:child_process';
import { existsSync, readdirSync } from 'node:fs';
import { join, resolve } from 'node:path';

/** Map of test categories to filename suffix filters. Unit tests are everything else. */
const categories = {
  unit: [],
  integration: ['integration.test.ts'],
  system: ['system.test.ts'],
  performance: ['performance.test.ts'],
  security: ['security.test.ts']
} as const satisfies Record<string, readonly string[]>;

/** Valid test category names. */
type Category = keyof typeof categories;

function isCategory(value: string | undefined): value is Category {
  return value !== undefined && Object.hasOwn(categories, value);
}

/** Selected category from CLI args. */
const category = process.argv[2];
if (!isCategory(category)) {
  const allowed = Object.keys(categories).join(', ');
  console.error(`Usage: tsx scripts/run-tests.ts <category>\nCategories: ${allowed}`);
  process.exit(1);
}

/** Suffixes claimed by the named categories. */
const categorySuffixes: readonly string[] = Object.values(categories).flat();

/**
 * Decide whether a test file belongs to the selected category.
 * @param name - File name.
 */
function matches(name: string, selected: Category): boolean {
  if (!name.endsWith('.test.ts')) return false;
  if (selected === 'unit') return !categorySuffixes.some((suffix) => name.endsWith(suffix));
  const suffixes: readonly string[] = categories[selected];
  return suffixes.some((suffix) => name.endsWith(suffix));
}

/** Root folders to scan for tests. */
const roots = ['src', 'server'];
/** Collected test file paths for the selected category. */
const files: string[] = [];

/** Recursively scan a directory and collect matching test files. */
function walk(dir: string, selected: Category): void {
  if (!existsSync(dir)) return;
  const entries = readdirSync(dir, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      walk(fullPath, selected);
      continue;
    }
    if (!entry.isFile()) continue;
    if (matches(entry.name, selected)) files.push(fullPath);
  }
}

for (const root of roots) walk(resolve(root), category);

if (!files.length) {
  console.error(`No test files found for category "${category}".`);
  process.exit(1);
}

const vitestBin = resolve(
  'node_modules',
  '.bin',
  process.platform === 'win32' ? 'vitest.cmd' : 'vitest'
);

const result = spawnSync(vitestBin, ['run', ...files], { stdio: 'inherit' });
if (result.error) {
  console.error(result.error.message);
  process.exit(1);
}
process.exit(result.status ?? 1);
