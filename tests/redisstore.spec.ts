import RedisMock from "ioredis-mock";
import { BackingStoreUnavailableError, RedisStore, TaggedCache } from "../src/index";
import { quietLogger } from "./test-utils";

describe("RedisStore", () => {
    let client: InstanceType<typeof RedisMock>;

    beforeEach(async () => {
        client = new RedisMock();
        await client.flushall();
    });

    test("stores payloads under the key prefix with a millisecond expiry", async () => {
        const store = new RedisStore(client, { keyPrefix: "app:" });
        await store.rawSet("user_1", "{\"id\":1}", 60);

        expect(await client.get("app:user_1")).toBe("{\"id\":1}");
        const pttl = await client.pttl("app:user_1");
        expect(pttl).toBeGreaterThan(0);
        expect(pttl).toBeLessThanOrEqual(60_000);
        expect(await store.rawGet("user_1")).toBe("{\"id\":1}");
    });

    test("missing keys read as null and deletes are idempotent", async () => {
        const store = new RedisStore(client);
        expect(await store.rawGet("nope")).toBeNull();
        await store.rawDelete("nope");
        await store.rawSet("k", "1", 10);
        await store.rawDelete("k");
        await store.rawDelete("k");
        expect(await store.rawGet("k")).toBeNull();
    });

    test("scans by prefix and strips the store prefix", async () => {
        const store = new RedisStore(client, { keyPrefix: "tc:", scanCount: 2 });
        await store.rawSet("user_1", "1", 60);
        await store.rawSet("user_2", "2", 60);
        await store.rawSet("user_list", "[]", 60);
        await store.rawSet("rider_1", "3", 60);
        await client.set("other:user_3", "x");

        expect((await store.rawScanByPrefix("user_")).sort()).toEqual(["user_1", "user_2", "user_list"]);
        expect((await store.rawScanByPrefix("")).sort()).toEqual(["rider_1", "user_1", "user_2", "user_list"]);
    });

    test("wraps client failures in BackingStoreUnavailableError", async () => {
        const store = new RedisStore(client);
        jest.spyOn(client, "get").mockRejectedValueOnce(new Error("Connection is closed."));

        await expect(store.rawGet("k")).rejects.toThrow(BackingStoreUnavailableError);
        await expect(store.rawGet("k")).resolves.toBeNull();
    });

    test("drives a TaggedCache end to end", async () => {
        const cache = new TaggedCache({ store: new RedisStore(client), checkperiod: 0, logger: quietLogger() });

        await cache.set("user_list", [{ id: 1 }, { id: 2 }], 300, ["user"]);
        await cache.set("user_1", { id: 1 }, 300, ["user"]);
        await cache.set("passenger_1", { id: 1 }, 300, ["passenger"]);
        expect(await cache.get("user_1")).toEqual({ found: true, value: { id: 1 } });

        await cache.invalidateTag("user");

        expect(await cache.get("user_list")).toEqual({ found: false });
        expect(await cache.get("user_1")).toEqual({ found: false });
        expect(await cache.get("passenger_1")).toEqual({ found: true, value: { id: 1 } });
        expect(await client.keys("tc:*")).toEqual(["tc:passenger_1"]);
    });

    test("a second engine over the same client never serves entries it cannot invalidate", async () => {
        const first = new TaggedCache({ store: new RedisStore(client), checkperiod: 0, logger: quietLogger() });
        await first.set("user_list", [{ id: 1, name: "old" }], 300, ["user"]);

        // a restarted process starts with an empty tag index
        const second = new TaggedCache({ store: new RedisStore(client), checkperiod: 0, logger: quietLogger() });
        expect(await second.invalidateTag("user")).toEqual([]);

        expect(await second.get("user_list")).toEqual({ found: false });
        expect(await client.get("tc:user_list")).toBeNull();
        expect(second.statistics("user")).toEqual({ hits: 0, misses: 1 });
    });

    test("close quits the connection", async () => {
        const store = new RedisStore(client);
        const quit = jest.spyOn(client, "quit");
        await store.close();
        expect(quit).toHaveBeenCalledTimes(1);
    });
});
