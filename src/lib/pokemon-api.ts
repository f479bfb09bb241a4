// Shapes served by the proxy and small helpers shared by the services.
import { apiError } from "./errors";

export const SPRITE_TYPES = ["default", "dream_world", "home", "official-artwork"] as const;
export type SpriteType = (typeof SPRITE_TYPES)[number];

export function isSpriteType(value: string): value is SpriteType {
  return (SPRITE_TYPES as readonly string[]).includes(value);
}

export interface PokemonSummary {
  id: number;
  name: string;
  url: string;
}

export interface PokemonPage {
  count: number;
  next: string | null;
  previous: string | null;
  results: PokemonSummary[];
}

export interface AbilitySummary {
  id: number;
  name: string;
}

export interface TypeSummary {
  id: number;
  name: string;
}

export interface SpriteSummary {
  type: SpriteType;
  url: string | null;
}

export interface PokemonDetail {
  id: number;
  name: string;
  abilities: AbilitySummary[];
  types: TypeSummary[];
  sprites: SpriteSummary[];
}

export interface SpriteInput {
  type: string;
  url: string | null;
}

export interface PokemonPatch {
  name?: string;
  abilities?: Array<number | string>;
  types?: Array<number | string>;
  sprites?: SpriteInput[];
}

/**
 * Upstream references only expose a canonical URL such as
 * `https://pokeapi.co/api/v2/ability/65/`; the trailing segment is the id.
 */
export function idFromUrl(url: string): number {
  const segment = url
    .split("?")[0]
    .split("/")
    .filter((part) => part.length > 0)
    .pop();
  if (!segment || !/^\d+$/.test(segment)) {
    throw apiError("E_EXTERNAL", `Cannot derive an id from upstream URL '${url}'`);
  }
  return Number(segment);
}

// Numeric identifiers address pokemon_id, anything else the stored name.
export function isNumericIdentifier(identifier: string): boolean {
  return /^\d+$/.test(identifier);
}
