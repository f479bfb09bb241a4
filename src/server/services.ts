import type { AppConfig } from "../lib/config";
import type { Logger } from "../lib/logger";
import { CatalogService } from "./catalog";
import type { Db } from "./db";
import type { Upstream } from "./pokeApi";
import { PokemonDetailService, PokemonListService } from "./pokemon";
import { PokemonUpdateService } from "./pokemonUpdate";

export interface ServiceDeps {
  db: Db;
  upstream: Upstream;
  config: AppConfig;
  logger: Logger;
}

export interface Services {
  detail: PokemonDetailService;
  update: PokemonUpdateService;
  list: PokemonListService;
  catalog: CatalogService;
}

export function createServices(deps: ServiceDeps): Services {
  return {
    detail: new PokemonDetailService(deps),
    update: new PokemonUpdateService(deps),
    list: new PokemonListService(deps),
    catalog: new CatalogService(deps),
  };
}
