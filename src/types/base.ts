export type Point = {
  x: number
  y: number
}

export type LineSegment = {
  start: Point
  end: Point
}

// Axis-aligned bounds, in the ROI's own coordinate space.
export type BoundingBox = {
  x: number
  y: number
  width: number
  height: number
}

// The (z-slice, timepoint, channel) selecting one 2D slice of a multidimensional image.
export type ImagePlane = {
  readonly z: number
  readonly t: number
  readonly c: number
}
