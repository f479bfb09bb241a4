import express, {
  type ErrorRequestHandler,
  type Express,
  type Request,
  type RequestHandler,
} from "express";
import { z } from "zod";

import type { Logger } from "../lib/logger";
import type { PokemonPatch } from "../lib/pokemon-api";
import { checkDatabase, type Db } from "./db";
import { apiError, errorMessage, statusForCode, toApiError } from "../lib/errors";
import type { Services } from "./services";

// -----------------------------------------------------------------------------
// Request schemas
// -----------------------------------------------------------------------------

export const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(0).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

const referenceList = z.array(z.union([z.number().int().nonnegative(), z.string().min(1)]));

// null is accepted wherever a field may be omitted and means the same thing
export const pokemonPatchSchema = z
  .object({
    name: z.string().min(1).nullish(),
    abilities: referenceList.nullish(),
    types: referenceList.nullish(),
    sprites: z
      .array(z.object({ type: z.string(), url: z.string().nullish() }))
      .nullish(),
  })
  .transform((body) => {
    const patch: PokemonPatch = {};
    if (body.name != null) patch.name = body.name;
    if (body.abilities != null) patch.abilities = body.abilities;
    if (body.types != null) patch.types = body.types;
    if (body.sprites != null) {
      patch.sprites = body.sprites.map((s) => ({ type: s.type, url: s.url ?? null }));
    }
    return patch;
  });

function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` '${issue.path.join(".")}'` : "";
    throw apiError("E_INVALID_ARG", `Invalid ${what}${where}: ${issue?.message ?? "invalid value"}`);
  }
  return parsed.data;
}

// -----------------------------------------------------------------------------
// Routing
// -----------------------------------------------------------------------------

interface JsonResult {
  status: number;
  body: unknown;
}

type JsonHandler = (req: Request) => Promise<JsonResult> | JsonResult;

function json(handler: JsonHandler): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => handler(req))
      .then(({ status, body }) => {
        res.status(status).json(body);
      })
      .catch(next);
  };
}

function requestUrl(req: Request): string {
  return `${req.protocol}://${req.get("host") ?? "localhost"}${req.originalUrl}`;
}

export interface AppDeps {
  services: Services;
  db: Db;
  logger: Logger;
}

export function createApp({ services, db, logger }: AppDeps): Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json());

  const api = express.Router();

  api.get(
    "/health",
    json(() => ({
      status: 200,
      body: { api_status: "ok", db_status: checkDatabase(db) ? "ok" : "error" },
    })),
  );

  api.get(
    "/pokemon",
    json((req) => {
      const { limit, offset } = parseWith(listQuerySchema, req.query, "query parameter");
      return { status: 200, body: services.list.listSummaries(limit, offset, requestUrl(req)) };
    }),
  );

  api.get(
    "/pokemon/:id",
    // An unknown pokemon is an empty result here, not an error
    json(async (req) => ({ status: 200, body: await services.detail.getDetail(req.params.id) })),
  );

  api.put(
    "/pokemon/:id",
    json(async (req) => {
      const patch = parseWith(pokemonPatchSchema, req.body ?? {}, "request body");
      return { status: 200, body: await services.update.updateDetail(req.params.id, patch) };
    }),
  );

  app.use("/api/v1", api);

  app.use((req, res) => {
    res.status(404).json({ message: `Route ${req.method} ${req.path} not found` });
  });

  const onError: ErrorRequestHandler = (err: unknown, req, res, _next) => {
    // express.json() reports malformed bodies as SyntaxError
    const error = err instanceof SyntaxError ? apiError("E_INVALID_ARG", "Malformed JSON body") : toApiError(err);
    const status = statusForCode(error.code);
    if (status >= 500) {
      logger.error({ err: error, method: req.method, path: req.originalUrl }, "Request failed");
    } else {
      logger.debug({ code: error.code, path: req.originalUrl }, errorMessage(error));
    }
    res.status(status).json({ message: errorMessage(error) });
  };
  app.use(onError);

  return app;
}
