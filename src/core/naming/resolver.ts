import { join } from 'node:path';

import { listDir } from '../../utils/fs.js';
import { assetName, type EditorSession, type LevelActor } from '../editor/types.js';
import type { ArtifactCategory, CategorySpec, CategoryTable } from './categories.js';
import { isIteration, matchTemplate, renderTemplate, type CompiledTemplate } from './template.js';

export interface DiscoveredArtifact {
  category: ArtifactCategory;
  /** Bare name that matched the template. */
  name: string;
  /** File path, asset path or actor label, depending on the category's location. */
  ref: string;
  piece: number | null;
  /** Set for level categories. */
  actor?: LevelActor;
}

export interface Inspection {
  category: ArtifactCategory;
  iteration: number;
  /** Human-readable location that was searched. */
  searched: string;
  matches: DiscoveredArtifact[];
  /** Names that fit the template but carry a different iteration (e.g. `mesh_02.csv` for 2). */
  mismatches: string[];
  /** The subset of `mismatches` whose iteration only differs in spelling (`02` for 2). */
  nearMisses: string[];
}

interface Candidate {
  names: string[];
  ref: string;
  actor?: LevelActor;
}

/**
 * Maps (category, iteration[, piece]) to concrete names and finds what exists.
 *
 * `resolve` is pure; `discover`/`inspect` read the filesystem or ask the Editor session.
 * Level and asset categories need a session; asking for one without it throws.
 */
export class NamingResolver {
  constructor(
    private readonly table: CategoryTable,
    private readonly session: EditorSession | null = null
  ) {}

  spec(category: ArtifactCategory): CategorySpec {
    return this.table[category];
  }

  resolve(category: ArtifactCategory, iteration: number, piece?: number): string {
    assertIteration(iteration);
    const spec = this.table[category];
    const name = renderTemplate(spec.template, iteration, piece);
    return this.place(spec, name);
  }

  /** Name an import should target: the base name for piece categories, else the resolved name. */
  importName(category: ArtifactCategory, iteration: number): string {
    assertIteration(iteration);
    const spec = this.table[category];
    return renderTemplate(spec.importAs ?? spec.template, iteration);
  }

  importTarget(category: ArtifactCategory, iteration: number): string {
    return this.place(this.table[category], this.importName(category, iteration));
  }

  describeLocation(category: ArtifactCategory): string {
    const loc = this.table[category].location;
    switch (loc.kind) {
      case 'filesystem':
        return loc.dir;
      case 'assets':
        return `${loc.folder} (assets, recursive)`;
      case 'level':
        return loc.className ? `current level (${loc.className} actors)` : 'current level';
    }
  }

  async discover(category: ArtifactCategory, iteration: number): Promise<DiscoveredArtifact[]> {
    return (await this.inspect(category, iteration)).matches;
  }

  async inspect(category: ArtifactCategory, iteration: number): Promise<Inspection> {
    assertIteration(iteration);
    const spec = this.table[category];
    const wanted = String(iteration);
    const matches: DiscoveredArtifact[] = [];
    const mismatches: string[] = [];
    const nearMisses: string[] = [];

    for (const candidate of await this.candidates(spec)) {
      const hit = firstMatch(spec.template, candidate.names);
      if (!hit) continue;
      if (hit.match.iteration !== null && hit.match.iteration !== wanted) {
        mismatches.push(hit.name);
        if (Number(hit.match.iteration) === iteration) nearMisses.push(hit.name);
        continue;
      }
      matches.push({ category, name: hit.name, ref: candidate.ref, piece: hit.match.piece, actor: candidate.actor });
    }

    matches.sort(spec.template.hasPiece ? byPiece : byName);
    mismatches.sort((a, b) => a.localeCompare(b));
    nearMisses.sort((a, b) => a.localeCompare(b));
    return { category, iteration, searched: this.describeLocation(category), matches, mismatches, nearMisses };
  }

  private place(spec: CategorySpec, name: string): string {
    switch (spec.location.kind) {
      case 'filesystem':
        return join(spec.location.dir, name);
      case 'assets':
        return `${spec.location.folder}/${name}`;
      case 'level':
        return name;
    }
  }

  private async candidates(spec: CategorySpec): Promise<Candidate[]> {
    const loc = spec.location;
    switch (loc.kind) {
      case 'filesystem': {
        const entries = await listDir(loc.dir);
        return entries.map((e) => ({ names: [e], ref: join(loc.dir, e) }));
      }
      case 'assets': {
        const assets = await this.requireSession(spec).listAssets(loc.folder, { recursive: true });
        return assets.map((a) => ({ names: [assetName(a)], ref: a }));
      }
      case 'level': {
        const actors = await this.requireSession(spec).listLevelActors();
        return actors
          .filter((a) => !loc.className || a.className === loc.className)
          .map((a) => ({
            names: loc.matchMeshName && a.meshAsset ? [a.label, assetName(a.meshAsset)] : [a.label],
            ref: a.label,
            actor: a
          }));
      }
    }
  }

  private requireSession(spec: CategorySpec): EditorSession {
    if (!this.session) throw new Error(`Discovering ${spec.id} needs an Editor session`);
    return this.session;
  }
}

function firstMatch(tpl: CompiledTemplate, names: string[]) {
  for (const name of names) {
    const match = matchTemplate(tpl, name);
    if (match) return { name, match };
  }
  return null;
}

function byPiece(a: DiscoveredArtifact, b: DiscoveredArtifact): number {
  return (a.piece ?? 0) - (b.piece ?? 0) || a.name.localeCompare(b.name);
}

function byName(a: DiscoveredArtifact, b: DiscoveredArtifact): number {
  return a.name.localeCompare(b.name);
}

function assertIteration(iteration: number): void {
  if (!isIteration(iteration)) throw new Error(`Iteration must be a non-negative integer, got ${iteration}`);
}
