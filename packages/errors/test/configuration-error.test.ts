import { describe, expect, it } from "vitest";
import { ConfigurationError, isConfigurationError } from "../src/configuration-error.js";
import { KeymapErrors } from "../src/keymap.js";
import { RenderErrors } from "../src/render.js";

describe("ConfigurationError", () => {
	it("should join headline and detail in the message", () => {
		const error = new ConfigurationError("UNKNOWN_LAYERS", RenderErrors.UNKNOWN_LAYERS(["fn", "num"]));

		expect(error.message).toBe('Some layer names selected for drawing are not in the keymap: "fn", "num"');
		expect(error.code).toBe("UNKNOWN_LAYERS");
		expect(error.name).toBe("ConfigurationError");
	});

	it("should use the headline alone when there is no detail", () => {
		const error = new ConfigurationError("DUPLICATE_LAYER", KeymapErrors.DUPLICATE_LAYER("base"));

		expect(error.message).toBe('Layer "base" is defined more than once');
		expect(error.userMessage).toEqual(['Layer "base" is defined more than once']);
	});
});

describe("isConfigurationError", () => {
	it("should recognize configuration errors only", () => {
		expect(isConfigurationError(new ConfigurationError("NO_LAYERS", KeymapErrors.NO_LAYERS))).toBe(true);
		expect(isConfigurationError(new Error("boom"))).toBe(false);
		expect(isConfigurationError("NO_LAYERS")).toBe(false);
	});
});
