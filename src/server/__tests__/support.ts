import { silentLogger } from "../../lib/logger";
import type { SpriteType } from "../../lib/pokemon-api";
import { openDatabase, repositoriesFor, type Db } from "../db";
import { apiError } from "../../lib/errors";
import {
  upstreamAbilitySchema,
  upstreamPokemonSchema,
  upstreamTypeSchema,
  type ResourceKind,
  type Upstream,
  type UpstreamListing,
  type UpstreamPokemon,
  type UpstreamResources,
} from "../pokeApi";
import { createServices, type Services } from "../services";
import blazeDocument from "./fixtures/ability-blaze.json";
import bulbasaurDocument from "./fixtures/pokemon-bulbasaur.json";
import fireDocument from "./fixtures/type-fire.json";

export const UPSTREAM_BASE = "https://pokeapi.test/api/v2";

export const bulbasaur = upstreamPokemonSchema.parse(bulbasaurDocument);
export const blaze = upstreamAbilitySchema.parse(blazeDocument);
export const fire = upstreamTypeSchema.parse(fireDocument);

function reference(kind: "ability" | "type", name: string, id: number) {
  return { name, url: `${UPSTREAM_BASE}/${kind}/${id}/` };
}

export interface PokemonDocumentOptions {
  abilities?: Array<[string, number]>;
  types?: Array<[string, number]>;
  sprites?: Partial<Record<SpriteType, string | null>>;
}

/** Minimal upstream pokemon document; sprite URLs default to https://img.test/<type>/<id>.png */
export function pokemonDocument(id: number, name: string, options: PokemonDocumentOptions = {}): UpstreamPokemon {
  const sprite = (spriteType: SpriteType) =>
    options.sprites && spriteType in options.sprites
      ? options.sprites[spriteType] ?? null
      : `https://img.test/${spriteType}/${id}.png`;
  return upstreamPokemonSchema.parse({
    id,
    name,
    abilities: (options.abilities ?? [["overgrow", 65]]).map(([abilityName, abilityId], index) => ({
      ability: reference("ability", abilityName, abilityId),
      is_hidden: false,
      slot: index + 1,
    })),
    types: (options.types ?? [["grass", 12]]).map(([typeName, typeId], index) => ({
      slot: index + 1,
      type: reference("type", typeName, typeId),
    })),
    sprites: {
      front_default: sprite("default"),
      other: {
        dream_world: { front_default: sprite("dream_world") },
        home: { front_default: sprite("home") },
        "official-artwork": { front_default: sprite("official-artwork") },
      },
    },
  });
}

export function listingDocument(entries: Array<[number, string]>): UpstreamListing {
  return {
    count: entries.length,
    next: null,
    previous: null,
    results: entries.map(([id, name]) => ({ name, url: `${UPSTREAM_BASE}/pokemon/${id}/` })),
  };
}

export type UpstreamCall =
  | { kind: ResourceKind; identifier: string }
  | { kind: "listing"; offset: number; limit: number };

/**
 * In-memory upstream. Resources are registered under every identifier they
 * should answer to; anything else fails like an upstream 404.
 */
export class FakeUpstream implements Upstream {
  readonly calls: UpstreamCall[] = [];
  listing: UpstreamListing = listingDocument([]);
  private readonly resources: { [K in ResourceKind]: Map<string, UpstreamResources[K]> } = {
    pokemon: new Map(),
    ability: new Map(),
    type: new Map(),
  };

  add<K extends ResourceKind>(kind: K, resource: UpstreamResources[K], ...aliases: Array<number | string>): this {
    const store: Map<string, UpstreamResources[K]> = this.resources[kind];
    for (const key of [resource.id, resource.name, ...aliases]) store.set(String(key), resource);
    return this;
  }

  callsFor(kind: UpstreamCall["kind"]): UpstreamCall[] {
    return this.calls.filter((call) => call.kind === kind);
  }

  async fetchResource<K extends ResourceKind>(kind: K, identifier: number | string): Promise<UpstreamResources[K]> {
    this.calls.push({ kind, identifier: String(identifier) });
    const store: Map<string, UpstreamResources[K]> = this.resources[kind];
    const resource = store.get(String(identifier));
    if (!resource) {
      throw apiError("E_UPSTREAM_NOT_FOUND", `[fake ${kind} ${identifier}] Not found`);
    }
    return resource;
  }

  async fetchListing(offset: number, limit: number): Promise<UpstreamListing> {
    this.calls.push({ kind: "listing", offset, limit });
    return this.listing;
  }
}

export interface TestContext {
  db: Db;
  upstream: FakeUpstream;
  services: Services;
}

export function createTestContext({
  totalPokemon = 1017,
  upstream = new FakeUpstream(),
}: { totalPokemon?: number; upstream?: FakeUpstream } = {}): TestContext {
  const db = openDatabase(":memory:");
  const services = createServices({
    db,
    upstream,
    config: Object.freeze({
      appName: "pokedex-cache-test",
      appVersion: "0.0.0",
      environment: "test",
      port: 0,
      logLevel: "silent",
      databasePath: ":memory:",
      pokeApiBaseUrl: UPSTREAM_BASE,
      totalPokemon,
      fetchAttempts: 1,
      fetchRetryDelayMs: 0,
      fetchTimeoutMs: 1000,
    }),
    logger: silentLogger(),
  });
  return { db, upstream, services };
}

export function seedPokemon(db: Db, entries: Array<[number, string]>): void {
  const { pokemon } = repositoriesFor(db);
  for (const [pokemonId, name] of entries) pokemon.create(name, pokemonId);
}

export function countRows(db: Db, table: string): unknown {
  return db.prepare(`SELECT COUNT(*) FROM ${table}`).pluck().get();
}
