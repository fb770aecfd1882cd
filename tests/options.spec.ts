import { OptionValidationError, TaggedCache, optionsFromEnv, validateOptions } from "../src/index";
import { quietLogger } from "./test-utils";

describe("options", () => {
    test("rejects bad options", () => {
        expect(() => new TaggedCache({ stdTTL: 0 })).toThrow(OptionValidationError);
        expect(() => new TaggedCache({ stdTTL: -5 })).toThrow(OptionValidationError);
        expect(() => new TaggedCache({ checkperiod: 10 })).toThrow(OptionValidationError);
        expect(() => new TaggedCache({ checkperiod: 1.5 })).toThrow(OptionValidationError);
        expect(() => new TaggedCache({ namespaceSeparator: "" })).toThrow(OptionValidationError);
        expect(() => new TaggedCache({ operationTimeout: -1 })).toThrow(OptionValidationError);
        expect(() => new TaggedCache({ encryption: true, secretKey: "" })).toThrow(OptionValidationError);
    });

    test("fills in defaults", () => {
        const resolved = validateOptions({ logger: quietLogger() });
        expect(resolved.stdTTL).toBe(300);
        expect(resolved.checkperiod).toBe(600);
        expect(resolved.namespaceSeparator).toBe("_");
        expect(resolved.operationTimeout).toBe(2000);
        expect(resolved.encryption).toBe(false);
    });

    test("reads the environment", () => {
        expect(
            optionsFromEnv({
                CACHE_TTL: "120",
                CACHE_CHECK_PERIOD: "0",
                CACHE_OPERATION_TIMEOUT_MS: "500",
                CACHE_SECRET_KEY: "test-secret",
            })
        ).toEqual({
            stdTTL: 120,
            checkperiod: 0,
            operationTimeout: 500,
            encryption: true,
            secretKey: "test-secret",
        });
        expect(optionsFromEnv({})).toEqual({});
    });

    test("rejects non-numeric environment values", () => {
        expect(() => optionsFromEnv({ CACHE_TTL: "five minutes" })).toThrow(OptionValidationError);
    });
});
