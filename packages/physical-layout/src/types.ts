/**
 * Geometry of a single physical key. (x, y) is the key center.
 */
export interface KeyGeometry {
	readonly x: number;
	readonly y: number;
	readonly width: number;
	readonly height: number;
	/** Rotation in degrees around the key center */
	readonly rotation: number;
}

/**
 * Literal key entry; size and rotation fall back to defaults.
 */
export interface RawKeySpec {
	x: number;
	y: number;
	width?: number;
	height?: number;
	rotation?: number;
}

export interface RawLayoutSpec {
	ltype: "raw";
	keys: RawKeySpec[];
}

export interface OrthoLayoutSpec {
	ltype: "ortho";
	rows: number;
	columns: number;
	thumbs?: number;
	split: boolean;
}

/**
 * Physical layout description, discriminated by `ltype`.
 */
export type PhysicalLayoutSpec = RawLayoutSpec | OrthoLayoutSpec;

export type LayoutType = PhysicalLayoutSpec["ltype"];
