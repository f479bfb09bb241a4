import { afterEach, describe, expect, it, vi } from "vitest";

import { silentLogger } from "../../lib/logger";
import { PokeApiClient, type FetchImpl } from "../pokeApi";
import bulbasaurDocument from "./fixtures/pokemon-bulbasaur.json";
import fireDocument from "./fixtures/type-fire.json";

const BASE = "https://pokeapi.test/api/v2";

function jsonResponse(body: unknown, status = 200, statusText = "OK") {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { "content-type": "application/json" },
  });
}

function createClient(fetchImpl: FetchImpl, attempts = 3) {
  return new PokeApiClient({
    baseUrl: `${BASE}/`,
    attempts,
    retryDelayMs: 0,
    timeoutMs: 1000,
    logger: silentLogger(),
    fetchImpl,
  });
}

describe("PokeApiClient.fetchResource", () => {
  it("requests the resource URL and decodes the document", async () => {
    const fetchMock = vi.fn<FetchImpl>(async () => jsonResponse(bulbasaurDocument));
    const client = createClient(fetchMock);

    const pokemon = await client.fetchResource("pokemon", 1);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe(`${BASE}/pokemon/1`);
    expect(pokemon.name).toBe("bulbasaur");
    expect(pokemon.abilities.map((a) => a.ability.name)).toEqual(["overgrow", "chlorophyll"]);
    expect(pokemon.sprites.other?.home?.front_default).toBe("https://img.test/home/1.png");
    expect(pokemon.weight).toBe(69);
  });

  it("encodes name identifiers", async () => {
    const fetchMock = vi.fn<FetchImpl>(async () => jsonResponse(fireDocument));
    await createClient(fetchMock).fetchResource("type", "fire/../x");
    expect(fetchMock.mock.calls[0]?.[0]).toBe(`${BASE}/type/fire%2F..%2Fx`);
  });

  it("retries transport failures", async () => {
    const fetchMock = vi
      .fn<FetchImpl>()
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(jsonResponse(fireDocument));

    const type = await createClient(fetchMock).fetchResource("type", 10);

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(type).toMatchObject({ id: 10, name: "fire" });
  });

  it("gives up after the configured attempts", async () => {
    const fetchMock = vi.fn<FetchImpl>(async () => jsonResponse({}, 500, "Internal Server Error"));

    await expect(createClient(fetchMock).fetchResource("ability", 66)).rejects.toThrow(
      "E_EXTERNAL:[PokéAPI ability 66] HTTP 500 Internal Server Error",
    );
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("wraps a transport error that outlasts every attempt", async () => {
    const fetchMock = vi.fn<FetchImpl>(async () => {
      throw new TypeError("fetch failed");
    });

    await expect(createClient(fetchMock, 2).fetchResource("ability", 66)).rejects.toMatchObject({
      code: "E_EXTERNAL",
      message: "E_EXTERNAL:[PokéAPI ability 66] fetch failed",
    });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("does not retry a 404", async () => {
    const fetchMock = vi.fn<FetchImpl>(async () => new Response("Not Found", { status: 404 }));

    await expect(createClient(fetchMock).fetchResource("ability", "nope")).rejects.toMatchObject({
      code: "E_UPSTREAM_NOT_FOUND",
      message: "E_UPSTREAM_NOT_FOUND:[PokéAPI ability nope] Not found",
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("counts an unparseable body as a failed attempt", async () => {
    const fetchMock = vi
      .fn<FetchImpl>()
      .mockResolvedValueOnce(new Response("<html>", { status: 200 }))
      .mockResolvedValueOnce(jsonResponse(fireDocument));

    await expect(createClient(fetchMock).fetchResource("type", 10)).resolves.toMatchObject({ name: "fire" });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("reports where a document does not match", async () => {
    const fetchMock = vi.fn<FetchImpl>(async () => jsonResponse({ id: 10 }));

    await expect(createClient(fetchMock, 1).fetchResource("type", 10)).rejects.toThrow(
      "E_EXTERNAL:[PokéAPI type 10] Unexpected payload at 'name': Required",
    );
  });

  it("refuses to fetch once closed", async () => {
    const fetchMock = vi.fn<FetchImpl>(async () => jsonResponse(fireDocument));
    const client = createClient(fetchMock);
    client.close();

    expect(client.closed).toBe(true);
    await expect(client.fetchResource("pokemon", 1)).rejects.toThrow(
      "E_EXTERNAL:[PokéAPI pokemon 1] Client is closed",
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("PokeApiClient retry timing", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("waits the same fixed delay before every retry and none after the last", async () => {
    vi.useFakeTimers();
    const fetchMock = vi.fn<FetchImpl>(async () => {
      throw new TypeError("fetch failed");
    });
    const client = new PokeApiClient({
      baseUrl: BASE,
      attempts: 3,
      retryDelayMs: 5000,
      timeoutMs: 60000,
      logger: silentLogger(),
      fetchImpl: fetchMock,
    });

    const outcome = client.fetchResource("ability", 66).catch((err: unknown) => err);

    await vi.advanceTimersByTimeAsync(4999);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(4999);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(1);
    expect(fetchMock).toHaveBeenCalledTimes(3);

    await expect(outcome).resolves.toMatchObject({
      code: "E_EXTERNAL",
      message: "E_EXTERNAL:[PokéAPI ability 66] fetch failed",
    });
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe("PokeApiClient response bodies", () => {
  function trackedBody() {
    const state = { cancelled: false };
    const stream = new ReadableStream<Uint8Array>({
      cancel() {
        state.cancelled = true;
      },
    });
    return { state, stream };
  }

  it("releases the body of a 404", async () => {
    const { state, stream } = trackedBody();
    const fetchMock = vi.fn<FetchImpl>(async () => new Response(stream, { status: 404 }));

    await expect(createClient(fetchMock).fetchResource("pokemon", 9999)).rejects.toMatchObject({
      code: "E_UPSTREAM_NOT_FOUND",
    });
    expect(state.cancelled).toBe(true);
  });

  it("releases the body of an error status", async () => {
    const { state, stream } = trackedBody();
    const fetchMock = vi.fn<FetchImpl>(async () => new Response(stream, { status: 503 }));

    await expect(createClient(fetchMock, 1).fetchResource("pokemon", 1)).rejects.toThrow(
      "E_EXTERNAL:[PokéAPI pokemon 1] HTTP 503 Unknown error",
    );
    expect(state.cancelled).toBe(true);
  });

  it("times out a body that never finishes", async () => {
    const fetchMock = vi.fn<FetchImpl>(async (_url, init) => {
      const stream = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('{"id": 10, '));
          init?.signal?.addEventListener("abort", () => controller.error(new Error("aborted")));
        },
      });
      return new Response(stream, { status: 200 });
    });
    const client = new PokeApiClient({
      baseUrl: BASE,
      attempts: 1,
      retryDelayMs: 0,
      timeoutMs: 20,
      logger: silentLogger(),
      fetchImpl: fetchMock,
    });

    await expect(client.fetchResource("type", 10)).rejects.toThrow(
      "E_EXTERNAL:[PokéAPI type 10] Request timed out after 20ms",
    );
  });
});

describe("PokeApiClient.fetchListing", () => {
  it("requests one page of the pokemon listing", async () => {
    const listing = {
      count: 2,
      next: null,
      previous: null,
      results: [
        { name: "bulbasaur", url: `${BASE}/pokemon/1/` },
        { name: "ivysaur", url: `${BASE}/pokemon/2/` },
      ],
    };
    const fetchMock = vi.fn<FetchImpl>(async () => jsonResponse(listing));

    await expect(createClient(fetchMock).fetchListing(0, 1017)).resolves.toEqual(listing);
    expect(fetchMock.mock.calls[0]?.[0]).toBe(`${BASE}/pokemon?offset=0&limit=1017`);
  });
});
