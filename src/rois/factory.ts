import { ImagePlane, Point } from '../types/base'
import {
  CompositePolygon,
  CompositeRoi,
  EllipseRoi,
  LineRoi,
  PointsRoi,
  PolygonRoi,
  PolylineRoi,
  RectangleRoi,
  Roi,
  RoiCategory,
  RoiType
} from '../types/rois'
import { calculatePolygonArea } from '../utils/geometry'
import { orientRing, removeConsecutiveDuplicates } from '../utils/polygon'
import { DEFAULT_PLANE } from './planes'

export class RoiCreationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'RoiCreationError'
  }
}

// Thrown when a ROI kind is not accepted by an operation.
export class UnsupportedRoiError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UnsupportedRoiError'
  }
}

function checkFinite(values: Record<string, number>): void {
  for (const [name, value] of Object.entries(values)) {
    if (!Number.isFinite(value)) {
      throw new RoiCreationError(`Invalid ${name}: ${value}`)
    }
  }
}

function copyPoints(points: readonly Point[], label: string): readonly Point[] {
  return Object.freeze(
    points.map((p, i) => {
      if (!Number.isFinite(p.x) || !Number.isFinite(p.y)) {
        throw new RoiCreationError(`Invalid ${label} point ${i}: (${p.x}, ${p.y})`)
      }
      return Object.freeze({ x: p.x, y: p.y })
    })
  )
}

export function createPlane({ z = 0, t = 0, c = -1 }: Partial<ImagePlane> = {}): ImagePlane {
  if (!Number.isInteger(z) || !Number.isInteger(t) || !Number.isInteger(c)) {
    throw new RoiCreationError(`Plane indices must be integers (z=${z}, t=${t}, c=${c})`)
  }
  return Object.freeze({ z, t, c })
}

// Rectangles and ellipses with a negative extent are flipped so that width and height are >= 0.
function normaliseBox(
  x: number,
  y: number,
  width: number,
  height: number
): { x: number; y: number; width: number; height: number } {
  checkFinite({ x, y, width, height })
  return {
    x: width < 0 ? x + width : x,
    y: height < 0 ? y + height : y,
    width: Math.abs(width),
    height: Math.abs(height)
  }
}

export function createRectangleRoi(
  x: number,
  y: number,
  width: number,
  height: number,
  plane: ImagePlane = DEFAULT_PLANE
): RectangleRoi {
  return Object.freeze<RectangleRoi>({
    type: RoiType.Rectangle,
    ...normaliseBox(x, y, width, height),
    plane
  })
}

export function createEllipseRoi(
  x: number,
  y: number,
  width: number,
  height: number,
  plane: ImagePlane = DEFAULT_PLANE
): EllipseRoi {
  return Object.freeze<EllipseRoi>({
    type: RoiType.Ellipse,
    ...normaliseBox(x, y, width, height),
    plane
  })
}

export function createPolygonRoi(
  points: readonly Point[],
  plane: ImagePlane = DEFAULT_PLANE
): PolygonRoi {
  return Object.freeze<PolygonRoi>({
    type: RoiType.Polygon,
    points: copyPoints(points, 'polygon'),
    plane
  })
}

// Rings are re-wound so that outer rings have positive and holes negative signed area.
// Rings enclosing no area are dropped, along with the holes of a dropped outer ring.
export function createCompositeRoi(
  polygons: readonly { outer: readonly Point[]; holes: readonly (readonly Point[])[] }[],
  plane: ImagePlane = DEFAULT_PLANE
): CompositeRoi {
  const output: CompositePolygon[] = []

  for (const polygon of polygons) {
    const outer = removeConsecutiveDuplicates(copyPoints(polygon.outer, 'outer ring'))
    if (calculatePolygonArea(outer) === 0) continue

    const holes = polygon.holes
      .map((hole) => removeConsecutiveDuplicates(copyPoints(hole, 'hole')))
      .filter((hole) => calculatePolygonArea(hole) !== 0)
      .map((hole) => Object.freeze(orientRing(hole, false)))

    output.push(
      Object.freeze({ outer: Object.freeze(orientRing(outer, true)), holes: Object.freeze(holes) })
    )
  }

  return Object.freeze<CompositeRoi>({
    type: RoiType.Composite,
    polygons: Object.freeze(output),
    plane
  })
}

// The explicitly-empty ROI: an area that encloses nothing.
export function createEmptyRoi(plane: ImagePlane = DEFAULT_PLANE): CompositeRoi {
  return createCompositeRoi([], plane)
}

export function createLineRoi(
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  plane: ImagePlane = DEFAULT_PLANE
): LineRoi {
  checkFinite({ x1, y1, x2, y2 })
  return Object.freeze<LineRoi>({ type: RoiType.Line, x1, y1, x2, y2, plane })
}

export function createPolylineRoi(
  points: readonly Point[],
  plane: ImagePlane = DEFAULT_PLANE
): PolylineRoi {
  return Object.freeze<PolylineRoi>({
    type: RoiType.Polyline,
    points: copyPoints(points, 'polyline'),
    plane
  })
}

export function createPointsRoi(
  points: readonly Point[],
  plane: ImagePlane = DEFAULT_PLANE
): PointsRoi {
  return Object.freeze<PointsRoi>({
    type: RoiType.Points,
    points: copyPoints(points, 'points'),
    plane
  })
}

export function getRoiCategory(roi: Roi): RoiCategory {
  switch (roi.type) {
    case RoiType.Rectangle:
    case RoiType.Ellipse:
    case RoiType.Polygon:
    case RoiType.Composite:
      return RoiCategory.Area
    case RoiType.Line:
    case RoiType.Polyline:
      return RoiCategory.Line
    case RoiType.Points:
      return RoiCategory.Point
  }
}
