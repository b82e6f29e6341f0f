import { ConfigurationError, LayoutErrors } from "@keysketch/errors";
import type { KeyGeometry } from "./types.js";

/**
 * Immutable ordered collection of key geometries.
 *
 * Extents are derived once at construction; the key list is frozen, so they
 * never need recomputing.
 */
export class PhysicalLayout {
	readonly keys: readonly KeyGeometry[];

	/** Max over keys of x + width / 2 */
	readonly width: number;

	/** Max over keys of y + height / 2 */
	readonly height: number;

	/** Smallest key width, the unit for horizontal combo offsets */
	readonly minWidth: number;

	/** Smallest key height, the unit for vertical combo offsets */
	readonly minHeight: number;

	constructor(keys: readonly KeyGeometry[]) {
		if (keys.length === 0) {
			throw new ConfigurationError("EMPTY_LAYOUT", LayoutErrors.EMPTY_LAYOUT);
		}
		keys.forEach((key, index) => {
			if (!(key.width > 0 && key.height > 0)) {
				throw new ConfigurationError("INVALID_KEY_SIZE", LayoutErrors.INVALID_KEY_SIZE(index));
			}
		});

		this.keys = Object.freeze(keys.map((key) => Object.freeze({ ...key })));
		this.width = Math.max(...this.keys.map((k) => k.x + k.width / 2));
		this.height = Math.max(...this.keys.map((k) => k.y + k.height / 2));
		this.minWidth = Math.min(...this.keys.map((k) => k.width));
		this.minHeight = Math.min(...this.keys.map((k) => k.height));
	}

	/** Number of keys */
	get size(): number {
		return this.keys.length;
	}

	/**
	 * Key at `index` in layout order.
	 * @throws RangeError if the index is outside the layout
	 */
	key(index: number): KeyGeometry {
		const key = this.keys[index];
		if (key === undefined) {
			throw new RangeError(`Key index ${index} is out of range (0-${this.keys.length - 1})`);
		}
		return key;
	}
}
