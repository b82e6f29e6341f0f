import { ConfigurationError, LayoutErrors } from "@keysketch/errors";
import { KEY_H, KEY_W, SPLIT_GAP } from "./constants.js";
import { PhysicalLayout } from "./physical-layout.js";
import type {
	KeyGeometry,
	OrthoLayoutSpec,
	PhysicalLayoutSpec,
	RawKeySpec,
	RawLayoutSpec,
} from "./types.js";

/**
 * Build a physical layout from its spec, dispatching on `ltype`.
 *
 * @throws ConfigurationError for invalid grid parameters or an unknown layout type
 */
export function layoutFactory(spec: PhysicalLayoutSpec): PhysicalLayout {
	switch (spec.ltype) {
		case "ortho":
			return new PhysicalLayout(createOrthoKeys(spec));
		case "raw":
			return new PhysicalLayout(createRawKeys(spec));
		default: {
			const unknown: { ltype: string } = spec;
			throw new ConfigurationError("UNKNOWN_LAYOUT_TYPE", LayoutErrors.UNKNOWN_LAYOUT_TYPE(unknown.ltype));
		}
	}
}

/**
 * Apply defaults to literal key entries.
 */
export function createRawKeys(spec: RawLayoutSpec): KeyGeometry[] {
	return spec.keys.map((key: RawKeySpec) => ({
		x: key.x,
		y: key.y,
		width: key.width ?? KEY_W,
		height: key.height ?? KEY_H,
		rotation: key.rotation ?? 0,
	}));
}

/**
 * Check grid parameters before any geometry is generated.
 */
export function validateOrthoSpec(spec: OrthoLayoutSpec): void {
	const thumbs = spec.thumbs ?? 0;

	if (!Number.isInteger(spec.rows) || spec.rows < 1) {
		throw new ConfigurationError("INVALID_GRID_DIMENSION", LayoutErrors.INVALID_GRID_DIMENSION("rows", spec.rows));
	}
	if (!Number.isInteger(spec.columns) || spec.columns < 1) {
		throw new ConfigurationError(
			"INVALID_GRID_DIMENSION",
			LayoutErrors.INVALID_GRID_DIMENSION("columns", spec.columns),
		);
	}
	if (!Number.isInteger(thumbs) || thumbs < 0) {
		throw new ConfigurationError("INVALID_THUMB_COUNT", LayoutErrors.INVALID_THUMB_COUNT(thumbs));
	}
	if (thumbs > 0) {
		if (thumbs > spec.columns) {
			throw new ConfigurationError(
				"THUMBS_EXCEED_COLUMNS",
				LayoutErrors.THUMBS_EXCEED_COLUMNS(thumbs, spec.columns),
			);
		}
		if (!spec.split) {
			throw new ConfigurationError("THUMBS_WITHOUT_SPLIT", LayoutErrors.THUMBS_WITHOUT_SPLIT);
		}
	}
}

/**
 * Generate grid keys.
 *
 * Order: row-major, left half before right half in each row, main rows
 * before the thumb row. Combo key positions index into this order.
 */
export function createOrthoKeys(spec: OrthoLayoutSpec): KeyGeometry[] {
	validateOrthoSpec(spec);

	const { rows, columns, split } = spec;
	const thumbs = spec.thumbs ?? 0;
	const keys: KeyGeometry[] = [];

	const createRow = (startX: number, y: number, count: number): void => {
		for (let i = 0; i < count; i++) {
			keys.push({
				x: startX + i * KEY_W + KEY_W / 2,
				y: y + KEY_H / 2,
				width: KEY_W,
				height: KEY_H,
				rotation: 0,
			});
		}
	};

	const rightHalfX = columns * KEY_W + SPLIT_GAP;

	for (let row = 0; row < rows; row++) {
		const y = row * KEY_H;
		createRow(0, y, columns);
		if (split) {
			createRow(rightHalfX, y, columns);
		}
	}

	if (thumbs > 0) {
		const y = rows * KEY_H;
		createRow((columns - thumbs) * KEY_W, y, thumbs);
		createRow(rightHalfX, y, thumbs);
	}

	return keys;
}
