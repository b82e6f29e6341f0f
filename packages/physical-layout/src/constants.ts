/** Default key width, also the horizontal pitch of generated grids */
export const KEY_W = 59;

/** Default key height, also the vertical pitch of generated grids */
export const KEY_H = 54;

/** Horizontal gap between the halves of a split grid */
export const SPLIT_GAP = KEY_W / 2;
