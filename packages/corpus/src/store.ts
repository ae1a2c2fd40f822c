import fs from 'fs-extra';
import path from 'path';
import yaml from 'js-yaml';
import { CorpusError, toTreePath, normalizePath } from '@repairbench/shared';
import type { Scenario } from '@repairbench/shared';
import { parseManifest } from './manifest';
import type { ParsedManifest } from './manifest';

const MANIFEST_EXTENSIONS = new Set(['.json', '.yaml', '.yml']);

export interface ScenarioFilter {
  category?: string;
  difficulty?: string;
}

/**
 * Read-only, validated collection of fault scenarios.
 *
 * Everything is checked at load time; once a store exists every scenario in it is
 * complete and frozen, and can be shared between concurrent runs.
 */
export class ScenarioStore {
  private readonly scenarios: Map<string, Scenario>;

  private constructor(scenarios: Map<string, Scenario>) {
    this.scenarios = scenarios;
  }

  /**
   * Loads every `*.json`, `*.yaml` and `*.yml` manifest directly inside `archivePath`.
   * A manifest may hold a single scenario or a list of them.
   */
  static async load(archivePath: string): Promise<ScenarioStore> {
    const root = path.resolve(archivePath);
    const stat = await fs.stat(root).catch(() => null);
    if (!stat || !stat.isDirectory()) {
      throw new CorpusError(`corpus directory not found: ${archivePath}`);
    }

    const entries = (await fs.readdir(root, { withFileTypes: true }))
      .filter((e) => e.isFile() && MANIFEST_EXTENSIONS.has(path.extname(e.name).toLowerCase()))
      .map((e) => e.name)
      .sort();

    if (entries.length === 0) {
      throw new CorpusError(`corpus ${archivePath} contains no scenario manifests`);
    }

    const scenarios = new Map<string, Scenario>();
    for (const name of entries) {
      const manifestPath = path.join(root, name);
      const documents = await readManifestFile(manifestPath);
      const baseId = path.basename(name, path.extname(name));

      for (const [index, doc] of documents.entries()) {
        const fallbackId = documents.length > 1 ? `${baseId}#${index}` : baseId;
        const parsed = parseManifest(doc, fallbackId);
        const files = await resolveFiles(parsed, path.dirname(manifestPath));
        addScenario(scenarios, freezeScenario(parsed, files, manifestPath));
      }
    }

    return new ScenarioStore(scenarios);
  }

  /**
   * Builds a store from already-constructed scenarios, with the same id checks
   * as `load`.
   */
  static fromScenarios(list: Iterable<Scenario>): ScenarioStore {
    const scenarios = new Map<string, Scenario>();
    for (const scenario of list) {
      addScenario(scenarios, Object.isFrozen(scenario) ? scenario : deepFreeze(scenario));
    }
    return new ScenarioStore(scenarios);
  }

  get(id: string): Scenario {
    const scenario = this.scenarios.get(id);
    if (!scenario) {
      throw new CorpusError(`unknown scenario '${id}'`, { scenarioId: id });
    }
    return scenario;
  }

  has(id: string): boolean {
    return this.scenarios.has(id);
  }

  get size(): number {
    return this.scenarios.size;
  }

  ids(): string[] {
    return [...this.scenarios.keys()];
  }

  /**
   * Lazy view over matching scenarios in load order. Each iteration starts over.
   */
  filter(criteria: ScenarioFilter = {}): Iterable<Scenario> {
    const scenarios = this.scenarios;
    return {
      *[Symbol.iterator]() {
        for (const scenario of scenarios.values()) {
          if (criteria.category !== undefined && scenario.category !== criteria.category) continue;
          if (criteria.difficulty !== undefined && scenario.difficulty !== criteria.difficulty)
            continue;
          yield scenario;
        }
      },
    };
  }

  /**
   * Scenario counts per category and per difficulty.
   */
  counts(criteria: ScenarioFilter = {}): {
    byCategory: Record<string, number>;
    byDifficulty: Record<string, number>;
  } {
    const byCategory: Record<string, number> = {};
    const byDifficulty: Record<string, number> = {};
    for (const s of this.filter(criteria)) {
      byCategory[s.category] = (byCategory[s.category] ?? 0) + 1;
      byDifficulty[s.difficulty] = (byDifficulty[s.difficulty] ?? 0) + 1;
    }
    return { byCategory, byDifficulty };
  }
}

async function readManifestFile(manifestPath: string): Promise<unknown[]> {
  const name = path.basename(manifestPath);
  let content: string;
  try {
    content = await fs.readFile(manifestPath, 'utf8');
  } catch (error: unknown) {
    throw new CorpusError(`cannot read manifest ${name}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = path.extname(name).toLowerCase() === '.json' ? JSON.parse(content) : yaml.load(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CorpusError(`cannot parse manifest ${name}: ${message}`, { cause: error });
  }

  return Array.isArray(parsed) ? parsed : [parsed];
}

async function resolveFiles(
  manifest: ParsedManifest,
  manifestDir: string,
): Promise<Record<string, string>> {
  const files: Record<string, string> = {};

  if (manifest.tree !== undefined) {
    const treeRoot = path.resolve(manifestDir, manifest.tree);
    const stat = await fs.stat(treeRoot).catch(() => null);
    if (!stat || !stat.isDirectory()) {
      throw new CorpusError(`scenario ${manifest.id}: unreadable tree '${manifest.tree}'`, {
        scenarioId: manifest.id,
        field: 'tree',
      });
    }
    for (const filePath of await walk(manifest.id, treeRoot, treeRoot)) {
      const treePath = toTreePath(normalizePath(path.relative(treeRoot, filePath)));
      if (treePath === null) continue;
      files[treePath] = await readTreeFile(manifest.id, filePath, treePath);
    }
  }

  // Inline content wins over the tree for the same path.
  Object.assign(files, manifest.files);
  assertNoFileDirectoryClash(manifest.id, files);

  if (Object.keys(files).length === 0) {
    throw new CorpusError(`scenario ${manifest.id}: file tree is empty`, {
      scenarioId: manifest.id,
      field: 'files',
    });
  }
  return files;
}

async function readTreeFile(id: string, filePath: string, treePath: string): Promise<string> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error: unknown) {
    throw new CorpusError(`scenario ${id}: unreadable file '${treePath}'`, {
      scenarioId: id,
      field: 'tree',
      cause: error,
    });
  }
  if (content.includes('\u0000')) {
    throw new CorpusError(`scenario ${id}: unreadable file '${treePath}' (binary content)`, {
      scenarioId: id,
      field: 'tree',
    });
  }
  return content;
}

async function walk(id: string, treeRoot: string, dir: string): Promise<string[]> {
  const out: string[] = [];
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name === '__pycache__' || entry.name === '.git') continue;
      out.push(...(await walk(id, treeRoot, full)));
    } else if (entry.isFile()) {
      out.push(full);
    } else {
      // Symlinks are followed to a regular file; anything else cannot be materialized.
      const target = entry.isSymbolicLink() ? await fs.stat(full).catch(() => null) : null;
      if (!target || !target.isFile()) {
        const treePath = normalizePath(path.relative(treeRoot, full));
        throw new CorpusError(`scenario ${id}: unreadable file '${treePath}' (not a regular file)`, {
          scenarioId: id,
          field: 'tree',
        });
      }
      out.push(full);
    }
  }
  return out;
}

function assertNoFileDirectoryClash(id: string, files: Record<string, string>): void {
  const paths = new Set(Object.keys(files));
  for (const filePath of paths) {
    const parts = filePath.split('/');
    for (let depth = 1; depth < parts.length; depth++) {
      const parent = parts.slice(0, depth).join('/');
      if (paths.has(parent)) {
        throw new CorpusError(
          `scenario ${id}: '${parent}' is both a file and the directory of '${filePath}'`,
          { scenarioId: id, field: 'files' },
        );
      }
    }
  }
}

function freezeScenario(
  manifest: ParsedManifest,
  files: Record<string, string>,
  manifestPath: string,
): Scenario {
  return deepFreeze({
    id: manifest.id,
    source: manifest.source,
    category: manifest.category,
    difficulty: manifest.difficulty,
    files,
    symptom: manifest.symptom,
    expectedFix: manifest.expectedFix,
    verificationCommand: manifest.verificationCommand,
    manifestPath,
  });
}

function addScenario(scenarios: Map<string, Scenario>, scenario: Scenario): void {
  const existing = scenarios.get(scenario.id);
  if (existing) {
    throw new CorpusError(
      `scenario ${scenario.id}: duplicate id (also defined in ${path.basename(existing.manifestPath)})`,
      { scenarioId: scenario.id, field: 'id' },
    );
  }
  scenarios.set(scenario.id, scenario);
}

function deepFreeze(scenario: Scenario): Scenario {
  Object.freeze(scenario.files);
  if (scenario.expectedFix.kind === 'behavioral' && scenario.expectedFix.locations) {
    Object.freeze(scenario.expectedFix.locations);
  }
  Object.freeze(scenario.expectedFix);
  return Object.freeze(scenario);
}
