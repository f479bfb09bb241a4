import type { SpriteType } from "../lib/pokemon-api";

// Row shapes as better-sqlite3 returns them (snake_case columns).
export interface PokemonRow {
  id: number;
  pokemon_id: number;
  name: string;
  active: number;
  created_at: string;
  updated_at: string;
}

export interface AbilityRow {
  id: number;
  name: string;
  internal_id: number;
  active: number;
  created_at: string;
  updated_at: string;
}

export type TypeRow = AbilityRow;

export interface PokemonAbilityRow {
  id: number;
  pokemon_id: number;
  ability_id: number;
}

export interface PokemonTypeRow {
  id: number;
  pokemon_id: number;
  type_id: number;
}

export interface SpriteRow {
  id: number;
  pokemon_id: number;
  sprite_type: SpriteType;
  url: string | null;
  active: number;
  created_at: string;
  updated_at: string;
}

const TIMESTAMPS = `
  active INTEGER NOT NULL DEFAULT 1,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
`;

export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS pokemons (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    pokemon_id INTEGER NOT NULL UNIQUE,
    name TEXT NOT NULL,
    ${TIMESTAMPS}
  )`,
  `CREATE INDEX IF NOT EXISTS pokemons_name_idx ON pokemons(name)`,

  // Abilities and types are shared across pokemon; internal_id is the upstream id
  `CREATE TABLE IF NOT EXISTS abilities (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    internal_id INTEGER NOT NULL UNIQUE,
    ${TIMESTAMPS}
  )`,
  `CREATE INDEX IF NOT EXISTS abilities_name_idx ON abilities(name)`,

  `CREATE TABLE IF NOT EXISTS types (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    internal_id INTEGER NOT NULL UNIQUE,
    ${TIMESTAMPS}
  )`,
  `CREATE INDEX IF NOT EXISTS types_name_idx ON types(name)`,

  `CREATE TABLE IF NOT EXISTS pokemon_abilities (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    pokemon_id INTEGER NOT NULL REFERENCES pokemons(id) ON DELETE CASCADE,
    ability_id INTEGER NOT NULL REFERENCES abilities(id)
  )`,
  `CREATE INDEX IF NOT EXISTS pokemon_abilities_pokemon_idx ON pokemon_abilities(pokemon_id)`,

  `CREATE TABLE IF NOT EXISTS pokemon_types (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    pokemon_id INTEGER NOT NULL REFERENCES pokemons(id) ON DELETE CASCADE,
    type_id INTEGER NOT NULL REFERENCES types(id)
  )`,
  `CREATE INDEX IF NOT EXISTS pokemon_types_pokemon_idx ON pokemon_types(pokemon_id)`,

  // One row per (pokemon, sprite_type) is kept by the services, not by a constraint
  `CREATE TABLE IF NOT EXISTS sprites (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    pokemon_id INTEGER NOT NULL REFERENCES pokemons(id) ON DELETE CASCADE,
    sprite_type TEXT NOT NULL CHECK (sprite_type IN ('default', 'dream_world', 'home', 'official-artwork')),
    url TEXT,
    ${TIMESTAMPS}
  )`,
  `CREATE INDEX IF NOT EXISTS sprites_pokemon_idx ON sprites(pokemon_id, sprite_type)`,
];
