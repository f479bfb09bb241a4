import type { AppConfig } from "../lib/config";
import type { Logger } from "../lib/logger";
import {
  SPRITE_TYPES,
  idFromUrl,
  type AbilitySummary,
  type PokemonDetail,
  type PokemonPage,
  type SpriteSummary,
  type SpriteType,
  type TypeSummary,
} from "../lib/pokemon-api";
import { repositoriesFor, withSession, type Db } from "./db";
import type { UpstreamPokemon, Upstream } from "./pokeApi";
import {
  hasAbilities,
  hasAllSprites,
  hasTypes,
  toSpriteSummary,
  type LinkRepository,
  type ReferenceRepository,
  type SpriteRepository,
} from "./pokemonInternal";
import type { PokemonRow } from "./schema";

// -----------------------------------------------------------------------------
// Detail
// -----------------------------------------------------------------------------

export function spriteUrl(pokemon: UpstreamPokemon, spriteType: SpriteType): string | null {
  if (spriteType === "default") return pokemon.sprites.front_default;
  return pokemon.sprites.other?.[spriteType]?.front_default ?? null;
}

export function composeDetail(
  pokemon: PokemonRow,
  abilities: AbilitySummary[],
  types: TypeSummary[],
  sprites: SpriteSummary[],
): PokemonDetail {
  return { id: pokemon.pokemon_id, name: pokemon.name, abilities, types, sprites };
}

/**
 * Look up or create each referenced ability/type, then link them all to the
 * pokemon. Summaries are read back from the stored link rows, not from the
 * upstream payload.
 */
function cacheReferences<Summary>(
  links: LinkRepository<Summary>,
  references: ReferenceRepository<{ id: number }>,
  isCached: (rows: readonly Summary[]) => boolean,
  pokemonLocalId: number,
  entries: ReadonlyArray<{ name: string; url: string }>,
): Summary[] {
  // Another request may have filled the links while we were waiting on upstream
  const current = links.listForPokemon(pokemonLocalId);
  if (isCached(current)) return current;

  const referenceIds = entries.map((entry) => {
    const internalId = idFromUrl(entry.url);
    const row = references.findByInternalId(internalId) ?? references.create(entry.name, internalId);
    return row.id;
  });
  links.insertMany(pokemonLocalId, referenceIds);
  return links.listForPokemon(pokemonLocalId);
}

// Only rows inserted by this pass are returned.
function cacheSprites(
  sprites: SpriteRepository,
  pokemonLocalId: number,
  upstream: UpstreamPokemon,
): SpriteSummary[] {
  const inserted: SpriteSummary[] = [];
  for (const spriteType of SPRITE_TYPES) {
    if (sprites.findByType(pokemonLocalId, spriteType)) continue;
    const row = sprites.create(pokemonLocalId, spriteType, spriteUrl(upstream, spriteType));
    inserted.push(toSpriteSummary(row));
  }
  return inserted;
}

export class PokemonDetailService {
  constructor(
    private readonly deps: { db: Db; upstream: Upstream; logger: Logger },
  ) {}

  /** Composed record for a pokemon_id or exact name; `null` when no row exists. */
  async getDetail(identifier: string): Promise<PokemonDetail | null> {
    return withSession(this.deps.db, async (session) => {
      const { repos } = session;
      const pokemon = repos.pokemon.findByIdentifier(identifier);
      if (!pokemon) return null;

      let abilities = repos.pokemonAbilities.listForPokemon(pokemon.id);
      let types = repos.pokemonTypes.listForPokemon(pokemon.id);
      let sprites = repos.sprites.listForPokemon(pokemon.id).map(toSpriteSummary);

      const missing = {
        abilities: !hasAbilities(abilities),
        types: !hasTypes(types),
        sprites: !hasAllSprites(sprites),
      };
      if (!missing.abilities && !missing.types && !missing.sprites) {
        return composeDetail(pokemon, abilities, types, sprites);
      }

      this.deps.logger.debug({ pokemonId: pokemon.pokemon_id, missing }, "Detail cache miss");
      const fromApi = await this.deps.upstream.fetchResource("pokemon", pokemon.pokemon_id);

      session.commit((r) => {
        if (missing.abilities) {
          abilities = cacheReferences(
            r.pokemonAbilities,
            r.abilities,
            hasAbilities,
            pokemon.id,
            fromApi.abilities.map((a) => a.ability),
          );
        }
        if (missing.types) {
          types = cacheReferences(
            r.pokemonTypes,
            r.types,
            hasTypes,
            pokemon.id,
            fromApi.types.map((t) => t.type),
          );
        }
        if (missing.sprites) {
          sprites = cacheSprites(r.sprites, pokemon.id, fromApi);
        }
      });

      return composeDetail(pokemon, abilities, types, sprites);
    });
  }
}

// -----------------------------------------------------------------------------
// Listing
// -----------------------------------------------------------------------------

export function baseUrlOf(requestUrl: string): string {
  return requestUrl.split("?")[0];
}

export function nextPageUrl(base: string, offset: number, limit: number, total: number): string | null {
  if (offset + limit >= total) return null;
  return `${base}?offset=${offset + limit}&limit=${limit}`;
}

// Not clamped: an initial offset smaller than limit yields a negative offset.
export function previousPageUrl(base: string, offset: number, limit: number): string | null {
  if (offset === 0) return null;
  return `${base}?offset=${offset - limit}&limit=${limit}`;
}

export class PokemonListService {
  constructor(
    private readonly deps: { db: Db; config: Pick<AppConfig, "totalPokemon"> },
  ) {}

  listSummaries(limit: number, offset: number, requestUrl: string): PokemonPage {
    const base = baseUrlOf(requestUrl);
    const total = this.deps.config.totalPokemon;
    const rows = repositoriesFor(this.deps.db).pokemon.listRange(offset, offset + limit);
    return {
      count: total,
      next: nextPageUrl(base, offset, limit, total),
      previous: previousPageUrl(base, offset, limit),
      results: rows.map((row) => ({
        id: row.pokemon_id,
        name: row.name,
        url: `${base}/${row.pokemon_id}`,
      })),
    };
  }
}
