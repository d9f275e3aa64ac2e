import { DEFAULT_FLATNESS } from '../constants'
import { BoundingBox, Point } from '../types/base'
import { Roi, RoiType } from '../types/rois'
import { flattenRoi } from '../paths/flattener'
import {
  calculateCentroid,
  calculatePolygonArea,
  calculatePolygonCentroid,
  calculatePolylineLength,
  calculateRingPerimeter,
  computePointToPointDistance,
  getPointsBounds
} from '../utils/geometry'
import { PointLocation, isPointInsidePolygon, locatePointInPolygon } from '../utils/polygon'

export function getRoiBounds(roi: Roi): BoundingBox {
  switch (roi.type) {
    case RoiType.Rectangle:
    case RoiType.Ellipse:
      return { x: roi.x, y: roi.y, width: roi.width, height: roi.height }
    case RoiType.Line:
      return getPointsBounds([
        { x: roi.x1, y: roi.y1 },
        { x: roi.x2, y: roi.y2 }
      ])
    case RoiType.Polygon:
    case RoiType.Polyline:
    case RoiType.Points:
      return getPointsBounds(roi.points)
    case RoiType.Composite:
      return getPointsBounds(roi.polygons.flatMap((polygon) => polygon.outer))
  }
}

export function getRoiArea(roi: Roi): number {
  switch (roi.type) {
    case RoiType.Rectangle:
      return roi.width * roi.height
    case RoiType.Ellipse:
      return (Math.PI * roi.width * roi.height) / 4
    case RoiType.Polygon:
      return Math.abs(calculatePolygonArea(roi.points))
    case RoiType.Composite:
      return roi.polygons.reduce(
        (total, polygon) =>
          total +
          Math.abs(calculatePolygonArea(polygon.outer)) -
          polygon.holes.reduce((sum, hole) => sum + Math.abs(calculatePolygonArea(hole)), 0),
        0
      )
    case RoiType.Line:
    case RoiType.Polyline:
    case RoiType.Points:
      return 0
  }
}

// Line length for line ROIs, perimeter for area ROIs.
export function getRoiLength(roi: Roi): number {
  switch (roi.type) {
    case RoiType.Rectangle:
      return 2 * (roi.width + roi.height)
    case RoiType.Ellipse: {
      // Ramanujan's approximation.
      const a = roi.width / 2
      const b = roi.height / 2
      return Math.PI * (3 * (a + b) - Math.sqrt((3 * a + b) * (a + 3 * b)))
    }
    case RoiType.Polygon:
      return calculateRingPerimeter(roi.points)
    case RoiType.Composite:
      return roi.polygons.reduce(
        (total, polygon) =>
          total +
          calculateRingPerimeter(polygon.outer) +
          polygon.holes.reduce((sum, hole) => sum + calculateRingPerimeter(hole), 0),
        0
      )
    case RoiType.Line:
      return computePointToPointDistance({ x: roi.x1, y: roi.y1 }, { x: roi.x2, y: roi.y2 })
    case RoiType.Polyline:
      return calculatePolylineLength(roi.points)
    case RoiType.Points:
      return 0
  }
}

function calculatePolylineCentroid(points: readonly Point[]): Point {
  let length = 0
  let cx = 0
  let cy = 0
  for (let i = 1; i < points.length; i++) {
    const segmentLength = computePointToPointDistance(points[i - 1], points[i])
    length += segmentLength
    cx += ((points[i - 1].x + points[i].x) / 2) * segmentLength
    cy += ((points[i - 1].y + points[i].y) / 2) * segmentLength
  }
  if (length === 0) {
    return calculateCentroid(points)
  }
  return { x: cx / length, y: cy / length }
}

export function getRoiCentroid(roi: Roi): Point {
  switch (roi.type) {
    case RoiType.Rectangle:
    case RoiType.Ellipse:
      return { x: roi.x + roi.width / 2, y: roi.y + roi.height / 2 }
    case RoiType.Polygon:
      return calculatePolygonCentroid(roi.points)
    case RoiType.Composite: {
      // Holes carry negative signed area and pull the centroid away from themselves.
      let area = 0
      let cx = 0
      let cy = 0
      for (const ring of roi.polygons.flatMap((polygon) => [polygon.outer, ...polygon.holes])) {
        const ringArea = calculatePolygonArea(ring)
        const ringCentroid = calculatePolygonCentroid(ring)
        area += ringArea
        cx += ringCentroid.x * ringArea
        cy += ringCentroid.y * ringArea
      }
      if (area === 0) {
        return calculateCentroid(roi.polygons.flatMap((polygon) => polygon.outer))
      }
      return { x: cx / area, y: cy / area }
    }
    case RoiType.Line:
      return { x: (roi.x1 + roi.x2) / 2, y: (roi.y1 + roi.y2) / 2 }
    case RoiType.Polyline:
      return calculatePolylineCentroid(roi.points)
    case RoiType.Points:
      return calculateCentroid(roi.points)
  }
}

// Points on an area's boundary count as contained. Line and point ROIs contain nothing.
export function roiContainsPoint(roi: Roi, point: Point): boolean {
  switch (roi.type) {
    case RoiType.Rectangle:
      return (
        point.x >= roi.x &&
        point.x <= roi.x + roi.width &&
        point.y >= roi.y &&
        point.y <= roi.y + roi.height
      )
    case RoiType.Ellipse: {
      const rx = roi.width / 2
      const ry = roi.height / 2
      if (rx === 0 || ry === 0) return false
      const dx = (point.x - roi.x - rx) / rx
      const dy = (point.y - roi.y - ry) / ry
      return dx * dx + dy * dy <= 1
    }
    case RoiType.Polygon:
      return isPointInsidePolygon(point, roi.points)
    case RoiType.Composite:
      return roi.polygons.some(
        (polygon) =>
          isPointInsidePolygon(point, polygon.outer) &&
          !polygon.holes.some((hole) => locatePointInPolygon(point, hole) === PointLocation.Inside)
      )
    case RoiType.Line:
    case RoiType.Polyline:
    case RoiType.Points:
      return false
  }
}

// Vertices of a ROI. Ellipses are flattened; composite rings are concatenated.
export function getPolygonPoints(roi: Roi, flatness: number = DEFAULT_FLATNESS): Point[] {
  switch (roi.type) {
    case RoiType.Rectangle: {
      const { x, y, width, height } = roi
      return [
        { x, y },
        { x: x + width, y },
        { x: x + width, y: y + height },
        { x, y: y + height }
      ]
    }
    case RoiType.Ellipse:
      return flattenRoi(roi, flatness).flatMap((ring) => [...ring])
    case RoiType.Composite:
      return roi.polygons.flatMap((polygon) => [
        ...polygon.outer,
        ...polygon.holes.flatMap((hole) => [...hole])
      ])
    case RoiType.Line:
      return [
        { x: roi.x1, y: roi.y1 },
        { x: roi.x2, y: roi.y2 }
      ]
    case RoiType.Polygon:
    case RoiType.Polyline:
    case RoiType.Points:
      return [...roi.points]
  }
}

export function getRoiNumPoints(roi: Roi): number {
  switch (roi.type) {
    case RoiType.Rectangle:
      return 4
    case RoiType.Line:
      return 2
    case RoiType.Polygon:
    case RoiType.Polyline:
    case RoiType.Points:
      return roi.points.length
    case RoiType.Ellipse:
    case RoiType.Composite:
      return getPolygonPoints(roi).length
  }
}

// Areas enclosing nothing, lines of zero length and point sets without points.
export function isRoiEmpty(roi: Roi): boolean {
  switch (roi.type) {
    case RoiType.Rectangle:
    case RoiType.Ellipse:
    case RoiType.Polygon:
    case RoiType.Composite:
      return getRoiArea(roi) === 0
    case RoiType.Line:
    case RoiType.Polyline:
      return getRoiLength(roi) === 0
    case RoiType.Points:
      return roi.points.length === 0
  }
}
