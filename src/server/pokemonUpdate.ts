import type { Logger } from "../lib/logger";
import {
  SPRITE_TYPES,
  isSpriteType,
  type PokemonDetail,
  type PokemonPatch,
  type SpriteSummary,
} from "../lib/pokemon-api";
import { withSession, type Db } from "./db";
import { apiError } from "../lib/errors";
import type { Upstream } from "./pokeApi";
import { toSpriteSummary, type LinkRepository, type ReferenceRepository } from "./pokemonInternal";
import type { AbilityRow } from "./schema";

type ReferenceKind = "ability" | "type";

const REFERENCE_LABELS: Record<ReferenceKind, string> = {
  ability: "Ability",
  type: "Type",
};

interface ResolvedReference {
  name: string;
  internalId: number;
}

function assertSpriteTypes(sprites: PokemonPatch["sprites"]): asserts sprites is SpriteSummary[] | undefined {
  const invalid = sprites?.find((sprite) => !isSpriteType(sprite.type));
  if (invalid) {
    throw apiError(
      "E_INVALID_ARG",
      `Invalid sprite type '${invalid.type}'. Valid types: ${SPRITE_TYPES.join(", ")}`,
    );
  }
}

function replaceLinks<Summary>(
  links: LinkRepository<Summary>,
  references: ReferenceRepository<AbilityRow>,
  pokemonLocalId: number,
  resolved: readonly ResolvedReference[],
): Summary[] {
  const referenceIds = resolved.map(
    ({ name, internalId }) =>
      (references.findByInternalId(internalId) ?? references.create(name, internalId)).id,
  );
  links.deleteForPokemon(pokemonLocalId);
  links.insertMany(pokemonLocalId, referenceIds);
  return links.listForPokemon(pokemonLocalId);
}

export class PokemonUpdateService {
  constructor(
    private readonly deps: { db: Db; upstream: Upstream; logger: Logger },
  ) {}

  /**
   * Replaces the patched collections wholesale. Fields left out of the patch
   * come back as empty collections, not as the stored values.
   */
  async updateDetail(identifier: string, patch: PokemonPatch): Promise<PokemonDetail> {
    return withSession(this.deps.db, async (session) => {
      const { repos } = session;
      const pokemon = repos.pokemon.findByIdentifier(identifier);
      if (!pokemon) {
        throw apiError("E_NOT_FOUND", `Pokemon '${identifier}' not found`);
      }
      const sprites = patch.sprites;
      assertSpriteTypes(sprites);

      const abilities = patch.abilities?.length
        ? await this.resolveReferences("ability", repos.abilities, patch.abilities)
        : null;
      const types = patch.types?.length
        ? await this.resolveReferences("type", repos.types, patch.types)
        : null;

      return session.commit((r): PokemonDetail => {
        const result: PokemonDetail = {
          id: pokemon.pokemon_id,
          name: patch.name ?? pokemon.name,
          abilities: [],
          types: [],
          sprites: [],
        };
        if (patch.name !== undefined) {
          r.pokemon.rename(pokemon.id, patch.name);
        }
        if (abilities) {
          result.abilities = replaceLinks(r.pokemonAbilities, r.abilities, pokemon.id, abilities);
        }
        if (types) {
          result.types = replaceLinks(r.pokemonTypes, r.types, pokemon.id, types);
        }
        if (sprites?.length) {
          r.sprites.deleteForPokemon(pokemon.id);
          result.sprites = sprites.map((sprite) =>
            toSpriteSummary(r.sprites.create(pokemon.id, sprite.type, sprite.url)),
          );
        }
        this.deps.logger.info(
          { pokemonId: pokemon.pokemon_id, fields: Object.keys(patch) },
          "Pokemon updated",
        );
        return result;
      });
    });
  }

  // Local row first (by upstream id for numbers, by name for strings), then upstream.
  private async resolveReferences(
    kind: ReferenceKind,
    references: ReferenceRepository<AbilityRow>,
    entries: ReadonlyArray<number | string>,
  ): Promise<ResolvedReference[]> {
    const resolved: ResolvedReference[] = [];
    for (const entry of entries) {
      const local =
        typeof entry === "number" ? references.findByInternalId(entry) : references.findByName(entry);
      if (local) {
        resolved.push({ name: local.name, internalId: local.internal_id });
        continue;
      }
      try {
        const fromApi = await this.deps.upstream.fetchResource(kind, entry);
        resolved.push({ name: fromApi.name, internalId: fromApi.id });
      } catch (err) {
        throw apiError(
          "E_UNRESOLVED",
          `${REFERENCE_LABELS[kind]} '${entry}' could not be resolved locally or upstream`,
          err,
        );
      }
    }
    return resolved;
  }
}
