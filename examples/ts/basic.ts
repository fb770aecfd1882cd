// TaggedCache: cache-aside reads + encrypted payloads
import TaggedCache, { optionsFromEnv } from "../../src/index";

async function main(): Promise<void> {
    const cache = new TaggedCache({
        ...optionsFromEnv(),
        encryption: true,
        secretKey: "change_me_please", // supply via CACHE_SECRET_KEY in prod
    });

    const users = await cache.getOrSet("user_list", async () => [{ id: 1, email: "ada@example.com" }], 300, ["user"]);
    console.log("users →", users);
    console.log("stats →", cache.statistics("user"));
    await cache.close();
}

main().catch((e: unknown) => {
    console.error(e);
    process.exitCode = 1;
});
