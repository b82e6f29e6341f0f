import { ConfigurationError } from "@keysketch/errors";
import { describe, expect, it } from "vitest";
import { layoutFactory } from "../src/builder.js";
import { PhysicalLayout } from "../src/physical-layout.js";

describe("PhysicalLayout", () => {
	const layout = new PhysicalLayout([
		{ x: 10, y: 20, width: 20, height: 10, rotation: 0 },
		{ x: 50, y: 5, width: 59, height: 54, rotation: 0 },
	]);

	it("should derive width and height from the key extents", () => {
		expect(layout.width).toBe(79.5);
		expect(layout.height).toBe(32);
	});

	it("should return identical extents on repeated access", () => {
		const first = [layout.width, layout.height];
		const second = [layout.width, layout.height];

		expect(second).toEqual(first);
	});

	it("should derive the smallest key dimensions", () => {
		expect(layout.minWidth).toBe(20);
		expect(layout.minHeight).toBe(10);
	});

	it("should match the grid extents of a split ortho layout", () => {
		const ortho = layoutFactory({ ltype: "ortho", rows: 2, columns: 3, split: true });

		expect(ortho.width).toBe(383.5);
		expect(ortho.height).toBe(108);
	});

	it("should expose key count and indexed access", () => {
		expect(layout.size).toBe(2);
		expect(layout.key(1).x).toBe(50);
		expect(() => layout.key(2)).toThrow(RangeError);
	});

	it("should not be affected by later changes to the source array", () => {
		const source = [{ x: 0, y: 0, width: 10, height: 10, rotation: 0 }];
		const frozen = new PhysicalLayout(source);
		source.push({ x: 100, y: 100, width: 10, height: 10, rotation: 0 });

		expect(frozen.size).toBe(1);
		expect(frozen.width).toBe(5);
		expect(Object.isFrozen(frozen.keys)).toBe(true);
	});

	it("should reject an empty key list", () => {
		expect(() => new PhysicalLayout([])).toThrow(ConfigurationError);
	});

	it("should reject keys without a positive size", () => {
		expect(() => new PhysicalLayout([{ x: 0, y: 0, width: 0, height: 10, rotation: 0 }])).toThrow(
			"Key 0 must have a positive width and height",
		);
	});
});
