// TaggedCache over Redis: tag invalidation driven by domain events
import { EventEmitter } from "events";
import { MutationInvalidator, TaggedCache, createRedisStore, itemKey, listKey } from "../../src/index";

async function main(): Promise<void> {
    const cache = new TaggedCache({ store: createRedisStore(process.env.REDIS_URL ?? "redis://localhost:6379/1") });
    const events = new EventEmitter();
    new MutationInvalidator(cache, { passenger: { tags: ["passenger"] } }).attach(events);

    await cache.set(listKey("passenger"), [{ id: 7 }], 300, ["passenger"]);
    await cache.set(itemKey("user", 2), { id: 2 }, 300, ["user"]);

    events.emit("mutation", { entity: "passenger", kind: "update", id: 7, related: [{ entity: "user", id: 2 }] });
    await new Promise((resolve) => setTimeout(resolve, 100));

    console.log("passenger_list →", await cache.get(listKey("passenger")));
    console.log("user_2 →", await cache.get(itemKey("user", 2)));
    await cache.close();
}

main().catch((e: unknown) => {
    console.error(e);
    process.exitCode = 1;
});
