// DB-only repositories. No network, no orchestration: the services decide
// when to call upstream and when to write.
import type BetterSqlite3 from "better-sqlite3";

import {
  SPRITE_TYPES,
  isNumericIdentifier,
  type AbilitySummary,
  type SpriteSummary,
  type SpriteType,
  type TypeSummary,
} from "../lib/pokemon-api";
import type { AbilityRow, PokemonRow, SpriteRow, TypeRow } from "./schema";

export interface PokemonRepository {
  findByIdentifier(identifier: string): PokemonRow | null;
  findByPokemonId(pokemonId: number): PokemonRow | null;
  listPokemonIds(): Set<number>;
  /** Rows with `start <= pokemon_id < end`, ascending. */
  listRange(start: number, end: number): PokemonRow[];
  create(name: string, pokemonId: number): PokemonRow;
  rename(id: number, name: string): void;
}

/** Shared lookup-or-create accessor for the abilities and types tables. */
export interface ReferenceRepository<Row> {
  findByInternalId(internalId: number): Row | null;
  findByName(name: string): Row | null;
  create(name: string, internalId: number): Row;
}

export interface LinkRepository<Summary> {
  listForPokemon(pokemonLocalId: number): Summary[];
  insertMany(pokemonLocalId: number, referenceIds: readonly number[]): number[];
  deleteForPokemon(pokemonLocalId: number): number;
}

export interface SpriteRepository {
  listForPokemon(pokemonLocalId: number): SpriteRow[];
  findByType(pokemonLocalId: number, spriteType: SpriteType): SpriteRow | null;
  create(pokemonLocalId: number, spriteType: SpriteType, url: string | null): SpriteRow;
  deleteForPokemon(pokemonLocalId: number): number;
}

export interface Repositories {
  pokemon: PokemonRepository;
  abilities: ReferenceRepository<AbilityRow>;
  types: ReferenceRepository<TypeRow>;
  pokemonAbilities: LinkRepository<AbilitySummary>;
  pokemonTypes: LinkRepository<TypeSummary>;
  sprites: SpriteRepository;
}

// -----------------------------------------------------------------------------
// Cache-sufficiency predicates
// -----------------------------------------------------------------------------

export function hasAbilities(abilities: readonly AbilitySummary[]): boolean {
  return abilities.length > 0;
}

export function hasTypes(types: readonly TypeSummary[]): boolean {
  return types.length > 0;
}

export function hasAllSprites(sprites: readonly unknown[]): boolean {
  return sprites.length >= SPRITE_TYPES.length;
}

export function toSpriteSummary(row: SpriteRow): SpriteSummary {
  return { type: row.sprite_type, url: row.url };
}

// -----------------------------------------------------------------------------
// Repositories
// -----------------------------------------------------------------------------

function pokemonRepository(db: BetterSqlite3.Database): PokemonRepository {
  const byPokemonIdStmt = db.prepare("SELECT * FROM pokemons WHERE pokemon_id = ? LIMIT 1");
  const byNameStmt = db.prepare("SELECT * FROM pokemons WHERE name = ? ORDER BY id LIMIT 1");
  const idsStmt = db.prepare("SELECT pokemon_id FROM pokemons").pluck();
  const rangeStmt = db.prepare(
    "SELECT * FROM pokemons WHERE pokemon_id >= ? AND pokemon_id < ? ORDER BY pokemon_id",
  );
  const insertStmt = db.prepare("INSERT INTO pokemons (pokemon_id, name) VALUES (?, ?)");
  const renameStmt = db.prepare(
    "UPDATE pokemons SET name = ?, updated_at = datetime('now') WHERE id = ?",
  );
  const byIdStmt = db.prepare("SELECT * FROM pokemons WHERE id = ?");

  const findByPokemonId = (pokemonId: number) =>
    (byPokemonIdStmt.get(pokemonId) as PokemonRow | undefined) ?? null;

  return {
    findByIdentifier(identifier) {
      if (isNumericIdentifier(identifier)) return findByPokemonId(Number(identifier));
      return (byNameStmt.get(identifier) as PokemonRow | undefined) ?? null;
    },
    findByPokemonId,
    listPokemonIds() {
      return new Set(idsStmt.all() as number[]);
    },
    listRange(start, end) {
      return rangeStmt.all(start, end) as PokemonRow[];
    },
    create(name, pokemonId) {
      const info = insertStmt.run(pokemonId, name);
      return byIdStmt.get(info.lastInsertRowid) as PokemonRow;
    },
    rename(id, name) {
      renameStmt.run(name, id);
    },
  };
}

function referenceRepository(
  db: BetterSqlite3.Database,
  table: "abilities" | "types",
): ReferenceRepository<AbilityRow> {
  const byInternalIdStmt = db.prepare(`SELECT * FROM ${table} WHERE internal_id = ? LIMIT 1`);
  const byNameStmt = db.prepare(`SELECT * FROM ${table} WHERE name = ? ORDER BY id LIMIT 1`);
  const insertStmt = db.prepare(`INSERT INTO ${table} (name, internal_id) VALUES (?, ?)`);
  const byIdStmt = db.prepare(`SELECT * FROM ${table} WHERE id = ?`);

  return {
    findByInternalId(internalId) {
      return (byInternalIdStmt.get(internalId) as AbilityRow | undefined) ?? null;
    },
    findByName(name) {
      return (byNameStmt.get(name) as AbilityRow | undefined) ?? null;
    },
    create(name, internalId) {
      const info = insertStmt.run(name, internalId);
      return byIdStmt.get(info.lastInsertRowid) as AbilityRow;
    },
  };
}

function linkRepository(
  db: BetterSqlite3.Database,
  link: { table: "pokemon_abilities"; column: "ability_id"; reference: "abilities" }
    | { table: "pokemon_types"; column: "type_id"; reference: "types" },
): LinkRepository<AbilitySummary> {
  const listStmt = db.prepare(`
    SELECT r.internal_id AS id, r.name AS name
    FROM ${link.table} l
    JOIN ${link.reference} r ON r.id = l.${link.column}
    WHERE l.pokemon_id = ?
    ORDER BY l.id
  `);
  const insertStmt = db.prepare(`INSERT INTO ${link.table} (pokemon_id, ${link.column}) VALUES (?, ?)`);
  const deleteStmt = db.prepare(`DELETE FROM ${link.table} WHERE pokemon_id = ?`);

  return {
    listForPokemon(pokemonLocalId) {
      return listStmt.all(pokemonLocalId) as AbilitySummary[];
    },
    insertMany(pokemonLocalId, referenceIds) {
      return referenceIds.map((referenceId) =>
        Number(insertStmt.run(pokemonLocalId, referenceId).lastInsertRowid),
      );
    },
    deleteForPokemon(pokemonLocalId) {
      return deleteStmt.run(pokemonLocalId).changes;
    },
  };
}

function spriteRepository(db: BetterSqlite3.Database): SpriteRepository {
  const listStmt = db.prepare("SELECT * FROM sprites WHERE pokemon_id = ? ORDER BY id");
  const byTypeStmt = db.prepare(
    "SELECT * FROM sprites WHERE pokemon_id = ? AND sprite_type = ? ORDER BY id LIMIT 1",
  );
  const insertStmt = db.prepare("INSERT INTO sprites (pokemon_id, sprite_type, url) VALUES (?, ?, ?)");
  const byIdStmt = db.prepare("SELECT * FROM sprites WHERE id = ?");
  const deleteStmt = db.prepare("DELETE FROM sprites WHERE pokemon_id = ?");

  return {
    listForPokemon(pokemonLocalId) {
      return listStmt.all(pokemonLocalId) as SpriteRow[];
    },
    findByType(pokemonLocalId, spriteType) {
      return (byTypeStmt.get(pokemonLocalId, spriteType) as SpriteRow | undefined) ?? null;
    },
    create(pokemonLocalId, spriteType, url) {
      const info = insertStmt.run(pokemonLocalId, spriteType, url);
      return byIdStmt.get(info.lastInsertRowid) as SpriteRow;
    },
    deleteForPokemon(pokemonLocalId) {
      return deleteStmt.run(pokemonLocalId).changes;
    },
  };
}

export function createRepositories(db: BetterSqlite3.Database): Repositories {
  return {
    pokemon: pokemonRepository(db),
    abilities: referenceRepository(db, "abilities"),
    types: referenceRepository(db, "types"),
    pokemonAbilities: linkRepository(db, {
      table: "pokemon_abilities",
      column: "ability_id",
      reference: "abilities",
    }),
    pokemonTypes: linkRepository(db, { table: "pokemon_types", column: "type_id", reference: "types" }),
    sprites: spriteRepository(db),
  };
}
