import { z } from "zod";

import type { AppConfig } from "../lib/config";
import type { Logger } from "../lib/logger";
import { ApiError, apiError } from "../lib/errors";

// -----------------------------------------------------------------------------
// Upstream documents. Only a handful of fields are persisted; the rest is
// typed for completeness and unknown keys pass through.
// -----------------------------------------------------------------------------

const namedResource = z.object({ name: z.string(), url: z.string() });
const nullableUrl = z.string().nullable().optional().transform((v) => v ?? null);
const artwork = z
  .object({ front_default: nullableUrl })
  .passthrough()
  .nullable()
  .optional();

export const upstreamPokemonSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    base_experience: z.number().nullable().optional(),
    height: z.number().optional(),
    weight: z.number().optional(),
    order: z.number().optional(),
    is_default: z.boolean().optional(),
    species: namedResource.optional(),
    abilities: z.array(
      z
        .object({
          ability: namedResource,
          is_hidden: z.boolean().optional(),
          slot: z.number().optional(),
        })
        .passthrough(),
    ),
    types: z.array(z.object({ slot: z.number().optional(), type: namedResource }).passthrough()),
    stats: z
      .array(
        z
          .object({ base_stat: z.number(), effort: z.number(), stat: namedResource })
          .passthrough(),
      )
      .optional(),
    sprites: z
      .object({
        front_default: nullableUrl,
        front_shiny: nullableUrl,
        back_default: nullableUrl,
        other: z
          .object({
            dream_world: artwork,
            home: artwork,
            "official-artwork": artwork,
          })
          .passthrough()
          .nullable()
          .optional(),
      })
      .passthrough(),
  })
  .passthrough();

const localizedName = z.object({ name: z.string(), language: namedResource }).passthrough();

export const upstreamAbilitySchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    is_main_series: z.boolean().optional(),
    generation: namedResource.optional(),
    names: z.array(localizedName).optional(),
    pokemon: z
      .array(z.object({ is_hidden: z.boolean(), slot: z.number(), pokemon: namedResource }).passthrough())
      .optional(),
  })
  .passthrough();

export const upstreamTypeSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    generation: namedResource.optional(),
    move_damage_class: namedResource.nullable().optional(),
    names: z.array(localizedName).optional(),
    pokemon: z.array(z.object({ slot: z.number(), pokemon: namedResource }).passthrough()).optional(),
  })
  .passthrough();

export const upstreamListingSchema = z.object({
  count: z.number().int(),
  next: z.string().nullable(),
  previous: z.string().nullable(),
  results: z.array(namedResource),
});

export type UpstreamPokemon = z.infer<typeof upstreamPokemonSchema>;
export type UpstreamAbility = z.infer<typeof upstreamAbilitySchema>;
export type UpstreamType = z.infer<typeof upstreamTypeSchema>;
export type UpstreamListing = z.infer<typeof upstreamListingSchema>;

export interface UpstreamResources {
  pokemon: UpstreamPokemon;
  ability: UpstreamAbility;
  type: UpstreamType;
}

export type ResourceKind = keyof UpstreamResources;

type Decoder<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const RESOURCE_SCHEMAS: { [K in ResourceKind]: Decoder<UpstreamResources[K]> } = {
  pokemon: upstreamPokemonSchema,
  ability: upstreamAbilitySchema,
  type: upstreamTypeSchema,
};

/** What the services need from upstream; tests substitute their own. */
export interface Upstream {
  fetchResource<K extends ResourceKind>(kind: K, identifier: number | string): Promise<UpstreamResources[K]>;
  fetchListing(offset: number, limit: number): Promise<UpstreamListing>;
}

// -----------------------------------------------------------------------------
// Client
// -----------------------------------------------------------------------------

export type FetchImpl = (input: string, init?: RequestInit) => Promise<Response>;

export interface PokeApiClientOptions {
  baseUrl: string;
  attempts: number;
  retryDelayMs: number;
  timeoutMs: number;
  logger: Logger;
  fetchImpl?: FetchImpl;
}

function delay(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Long-lived upstream client. Built once at startup and shared by every
 * service; `close()` aborts whatever is still in flight.
 */
export class PokeApiClient implements Upstream {
  private readonly baseUrl: string;
  private readonly attempts: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly fetchImpl: FetchImpl;
  private readonly lifetime = new AbortController();

  constructor(options: PokeApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.attempts = Math.max(1, options.attempts);
    this.retryDelayMs = options.retryDelayMs;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  static fromConfig(config: AppConfig, logger: Logger, fetchImpl?: FetchImpl): PokeApiClient {
    return new PokeApiClient({
      baseUrl: config.pokeApiBaseUrl,
      attempts: config.fetchAttempts,
      retryDelayMs: config.fetchRetryDelayMs,
      timeoutMs: config.fetchTimeoutMs,
      logger,
      fetchImpl,
    });
  }

  get closed(): boolean {
    return this.lifetime.signal.aborted;
  }

  close(): void {
    if (!this.closed) this.lifetime.abort();
  }

  async fetchResource<K extends ResourceKind>(
    kind: K,
    identifier: number | string,
  ): Promise<UpstreamResources[K]> {
    const url = `${this.baseUrl}/${kind}/${encodeURIComponent(String(identifier))}`;
    const schema: Decoder<UpstreamResources[K]> = RESOURCE_SCHEMAS[kind];
    return this.fetchJson(url, `PokéAPI ${kind} ${identifier}`, schema);
  }

  async fetchListing(offset: number, limit: number): Promise<UpstreamListing> {
    const url = `${this.baseUrl}/pokemon?offset=${offset}&limit=${limit}`;
    return this.fetchJson(url, "PokéAPI pokemon listing", upstreamListingSchema);
  }

  // One attempt. The timeout covers the body read as well as the headers.
  private async fetchOnce<T>(url: string, label: string, schema: Decoder<T>): Promise<T> {
    const controller = new AbortController();
    const onClose = () => controller.abort();
    this.lifetime.signal.addEventListener("abort", onClose);
    const id = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const res = await this.fetchImpl(url, {
        headers: { accept: "application/json" },
        signal: controller.signal,
      });
      if (res.status === 404) {
        await res.body?.cancel();
        throw apiError("E_UPSTREAM_NOT_FOUND", `[${label}] Not found`);
      }
      if (!res.ok) {
        await res.body?.cancel();
        throw apiError("E_EXTERNAL", `[${label}] HTTP ${res.status} ${res.statusText || "Unknown error"}`);
      }
      let body: unknown;
      try {
        body = await res.json();
      } catch (err) {
        if (controller.signal.aborted) {
          throw apiError("E_EXTERNAL", `[${label}] Request timed out after ${this.timeoutMs}ms`, err);
        }
        throw apiError("E_EXTERNAL", `[${label}] Invalid JSON response`, err);
      }
      const parsed = schema.safeParse(body);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw apiError(
          "E_EXTERNAL",
          `[${label}] Unexpected payload at '${issue?.path.join(".") ?? ""}': ${issue?.message ?? "invalid"}`,
        );
      }
      return parsed.data;
    } finally {
      clearTimeout(id);
      this.lifetime.signal.removeEventListener("abort", onClose);
    }
  }

  // Fixed-interval retry: transport, status and decode failures all count as
  // one attempt. A 404 is final.
  private async fetchJson<T>(url: string, label: string, schema: Decoder<T>): Promise<T> {
    let lastErr: unknown = undefined;
    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      if (this.closed) {
        throw apiError("E_EXTERNAL", `[${label}] Client is closed`);
      }
      try {
        return await this.fetchOnce(url, label, schema);
      } catch (e) {
        if (e instanceof ApiError && e.code === "E_UPSTREAM_NOT_FOUND") throw e;
        lastErr = e;
        const msg = e instanceof Error ? e.message : String(e);
        if (attempt < this.attempts && !this.closed) {
          this.logger.warn({ url, attempt, err: msg }, "Upstream request failed, retrying");
          await delay(this.retryDelayMs);
        }
      }
    }
    if (lastErr instanceof ApiError) throw lastErr;
    const msg = lastErr instanceof Error ? lastErr.message : "Unknown error";
    throw apiError("E_EXTERNAL", `[${label}] ${msg}`, lastErr);
  }
}
