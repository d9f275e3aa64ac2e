// Default curve flattening tolerance, as the maximum control point distance from the chord.
export const DEFAULT_FLATNESS = 0.5

// Maximum recursion depth when subdividing a curve during flattening.
export const MAX_FLATTEN_DEPTH = 10

// Bézier control point offset for a quarter ellipse, as a fraction of the semi-axis.
export const ELLIPSE_CONTROL_FACTOR = 0.5522847498307933

// Snap tolerance for self-intersection repair, as a fraction of the ring's bounding diagonal.
export const SNAP_TOLERANCE_FACTOR = 1e-9

// Largest relative area change for which a repaired ring is still considered safe.
export const REPAIR_AREA_TOLERANCE = 1e-4
