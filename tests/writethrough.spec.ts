import { BackingStoreUnavailableError, InvalidArgumentError, MemoryStore, TaggedCache } from "../src/index";
import { FlakyStore, quietLogger } from "./test-utils";

describe("writeThrough", () => {
    test("caches the value after the commit succeeds", async () => {
        const c = new TaggedCache({ checkperiod: 0, logger: quietLogger() });
        const db = new Map<string, string>();

        await c.writeThrough("user_1", "Ada", async (v) => { db.set("1", v); }, 60, ["user"]);

        expect(db.get("1")).toBe("Ada");
        expect(await c.get("user_1")).toEqual({ found: true, value: "Ada" });
        expect(c.getKeysByTag("user")).toEqual(["user_1"]);
    });

    test("caches the value as the commit left it", async () => {
        const c = new TaggedCache({ checkperiod: 0, logger: quietLogger() });
        const record: { id?: number; name: string } = { name: "Ada" };

        await c.writeThrough("user_new", record, async (v) => {
            v.id = 7;
        }, 60, ["user"]);

        expect(await c.get("user_new")).toEqual({ found: true, value: { id: 7, name: "Ada" } });
    });

    test("rejects an unencodable value before committing", async () => {
        const c = new TaggedCache({ checkperiod: 0, logger: quietLogger() });
        const commit = jest.fn();

        await expect(c.writeThrough("user_1", undefined, commit, 60)).rejects.toThrow(InvalidArgumentError);
        expect(commit).not.toHaveBeenCalled();
    });

    test("does not cache when the commit fails and rethrows its error unchanged", async () => {
        const store = new MemoryStore();
        const c = new TaggedCache({ store, checkperiod: 0, logger: quietLogger() });
        await c.set("user_1", "old", 60);
        const failure = new Error("constraint violated");

        await expect(
            c.writeThrough("user_1", "new", () => Promise.reject(failure), 60)
        ).rejects.toBe(failure);

        expect(await c.get("user_1")).toEqual({ found: true, value: "old" });
    });

    test("does not commit when the arguments are invalid", async () => {
        const c = new TaggedCache({ checkperiod: 0, logger: quietLogger() });
        const commit = jest.fn();

        await expect(c.writeThrough("user_1", "v", commit, -1)).rejects.toThrow(InvalidArgumentError);
        expect(commit).not.toHaveBeenCalled();
    });

    test("drops the stale entry when the cache write fails after commit", async () => {
        const store = new FlakyStore();
        const c = new TaggedCache({ store, checkperiod: 0, logger: quietLogger() });
        await c.set("user_1", "old", 60, ["user"]);
        store.failWith = new Error("connection reset");
        store.failSetOnly = true;

        await expect(c.writeThrough("user_1", "new", async () => undefined, 60)).rejects.toThrow(
            BackingStoreUnavailableError
        );

        expect(store.data.has("user_1")).toBe(false);
        expect(c.getTags()).toEqual([]);
    });
});

describe("getOrSet", () => {
    test("computes once and serves later reads from cache", async () => {
        const c = new TaggedCache({ checkperiod: 0, logger: quietLogger() });
        const compute = jest.fn(async () => [{ id: 1 }]);

        expect(await c.getOrSet("user_list", compute, 60, ["user"])).toEqual([{ id: 1 }]);
        expect(await c.getOrSet("user_list", compute, 60, ["user"])).toEqual([{ id: 1 }]);

        expect(compute).toHaveBeenCalledTimes(1);
        expect(c.statistics("user")).toEqual({ hits: 1, misses: 1 });
    });

    test("recomputes after the tag is invalidated", async () => {
        const c = new TaggedCache({ checkperiod: 0, logger: quietLogger() });
        let version = 0;
        const compute = async () => ++version;

        expect(await c.getOrSet("user_list", compute, 60, ["user"])).toBe(1);
        await c.invalidateTag("user");
        expect(await c.getOrSet("user_list", compute, 60, ["user"])).toBe(2);
    });
});
