import type { AppConfig } from "../lib/config";
import type { Logger } from "../lib/logger";
import { idFromUrl } from "../lib/pokemon-api";
import { withSession, type Db } from "./db";
import type { Upstream } from "./pokeApi";

export interface CatalogResult {
  fetched: number;
  inserted: number;
}

export class CatalogService {
  constructor(
    private readonly deps: {
      db: Db;
      upstream: Upstream;
      config: Pick<AppConfig, "totalPokemon">;
      logger: Logger;
    },
  ) {}

  /**
   * Seeds the pokemons table from the upstream listing. Runs once before the
   * server accepts traffic; every insert commits on its own, so a failure
   * part way leaves the rows written so far.
   */
  async initCatalog(): Promise<CatalogResult> {
    const { db, upstream, config, logger } = this.deps;
    logger.info({ total: config.totalPokemon }, "Initializing pokemon catalog");

    const listing = await upstream.fetchListing(0, config.totalPokemon);

    return withSession(db, async (session) => {
      const known = session.repos.pokemon.listPokemonIds();
      let inserted = 0;
      for (const entry of listing.results) {
        const pokemonId = idFromUrl(entry.url);
        if (known.has(pokemonId)) continue;
        session.commit((r) => r.pokemon.create(entry.name, pokemonId));
        known.add(pokemonId);
        inserted++;
      }
      logger.info({ fetched: listing.results.length, inserted }, "Pokemon catalog initialized");
      return { fetched: listing.results.length, inserted };
    });
  }
}
