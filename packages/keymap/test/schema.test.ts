import { ConfigurationError } from "@keysketch/errors";
import { describe, expect, it } from "vitest";
import { parseKeymapInput } from "../src/schema.js";

describe("parseKeymapInput", () => {
	it("should build the layout and document from JSON data", () => {
		const doc = parseKeymapInput({
			layout: { ltype: "raw", keys: [{ x: 30, y: 27 }, { x: 89, y: 27 }] },
			layers: { base: ["Q", { t: "W", h: "Alt" }] },
			combos: [{ keyPositions: [0, 1], legend: "Esc", align: "top", offset: 0.5 }],
		});

		expect(doc.layout.size).toBe(2);
		expect(doc.layers.get("base")?.[1]?.hold).toBe("Alt");
		expect(doc.combos[0]?.align).toBe("top");
	});

	it("should keep the order of a layer list read from JSON", () => {
		const doc = parseKeymapInput(
			JSON.parse(
				'{"layout":{"ltype":"raw","keys":[{"x":30,"y":27}]},' +
					'"layers":[{"name":"base","keys":["A"]},{"name":"2","keys":["B"]},{"name":"1","keys":["C"]}]}',
			),
		);

		expect([...doc.layers.keys()]).toEqual(["base", "2", "1"]);
	});

	it("should reject a layer list entry without a name", () => {
		expect(() =>
			parseKeymapInput({
				layout: { ltype: "raw", keys: [{ x: 0, y: 0 }] },
				layers: [{ name: "", keys: ["A"] }],
			}),
		).toThrow(ConfigurationError);
	});

	it("should report schema issues with their paths", () => {
		expect(() =>
			parseKeymapInput({
				layout: { ltype: "raw", keys: [{ x: 0, y: 0 }] },
				layers: { base: [42] },
			}),
		).toThrow(ConfigurationError);
	});

	it("should reject an unknown combo alignment", () => {
		try {
			parseKeymapInput({
				layout: { ltype: "raw", keys: [{ x: 0, y: 0 }, { x: 60, y: 0 }] },
				layers: { base: ["a", "b"] },
				combos: [{ keyPositions: [0, 1], legend: "x", align: "center" }],
			});
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(ConfigurationError);
			if (error instanceof ConfigurationError) {
				expect(error.code).toBe("INVALID_INPUT");
				expect(error.userMessage[1]).toContain("combos.0.align");
			}
		}
	});

	it("should surface grid errors from the layout builder", () => {
		expect(() =>
			parseKeymapInput({
				layout: { ltype: "ortho", rows: 1, columns: 2, thumbs: 1 },
				layers: { base: [] },
			}),
		).toThrow("Cannot process non-split keyboard with thumb keys");
	});
});
