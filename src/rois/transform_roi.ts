import { ImagePlane, Point } from '../types/base'
import { Roi, RoiType } from '../types/rois'
import { Transform } from '../utils/transform'
import {
  createCompositeRoi,
  createEllipseRoi,
  createLineRoi,
  createPointsRoi,
  createPolygonRoi,
  createPolylineRoi,
  createRectangleRoi
} from './factory'

// Applies an axis-aligned transform (translation and scaling only) to a ROI.
function transformRoi(roi: Roi, transform: Transform, plane: ImagePlane = roi.plane): Roi {
  const map = (points: readonly Point[]): Point[] => transform.transformPoints(points)

  switch (roi.type) {
    case RoiType.Rectangle:
    case RoiType.Ellipse: {
      const p1 = transform.transformPoint({ x: roi.x, y: roi.y })
      const p2 = transform.transformPoint({ x: roi.x + roi.width, y: roi.y + roi.height })
      const create = roi.type === RoiType.Rectangle ? createRectangleRoi : createEllipseRoi
      return create(p1.x, p1.y, p2.x - p1.x, p2.y - p1.y, plane)
    }
    case RoiType.Line: {
      const p1 = transform.transformPoint({ x: roi.x1, y: roi.y1 })
      const p2 = transform.transformPoint({ x: roi.x2, y: roi.y2 })
      return createLineRoi(p1.x, p1.y, p2.x, p2.y, plane)
    }
    case RoiType.Polygon:
      return createPolygonRoi(map(roi.points), plane)
    case RoiType.Polyline:
      return createPolylineRoi(map(roi.points), plane)
    case RoiType.Points:
      return createPointsRoi(map(roi.points), plane)
    case RoiType.Composite:
      return createCompositeRoi(
        roi.polygons.map((polygon) => ({
          outer: map(polygon.outer),
          holes: polygon.holes.map(map)
        })),
        plane
      )
  }
}

export function translateRoi(roi: Roi, dx: number, dy: number): Roi {
  if (dx === 0 && dy === 0) return roi
  return transformRoi(roi, Transform.translate(dx, dy))
}

// Scales about `origin`. A negative factor mirrors the ROI.
export function scaleRoi(
  roi: Roi,
  sx: number,
  sy: number = sx,
  origin: Point = { x: 0, y: 0 }
): Roi {
  if (sx === 1 && sy === 1) return roi
  const transform = Transform.translate(origin.x, origin.y)
    .scale(sx, sy)
    .translate(-origin.x, -origin.y)
  return transformRoi(roi, transform)
}

export function updateRoiPlane(roi: Roi, plane: ImagePlane): Roi {
  return transformRoi(roi, new Transform(), plane)
}
