import robustPointInPolygon from 'robust-point-in-polygon'
import { Point } from '../types/base'
import { calculatePolygonArea, isLeft, pointsEqual } from './geometry'

export enum PointLocation {
  Inside = 'inside',
  Boundary = 'boundary',
  Outside = 'outside'
}

export function locatePointInPolygon(point: Point, polygon: readonly Point[]): PointLocation {
  if (polygon.length < 3) {
    return PointLocation.Outside
  }

  const loop = polygon.map((p) => [p.x, p.y])
  switch (robustPointInPolygon(loop, [point.x, point.y])) {
    case -1:
      return PointLocation.Inside
    case 0:
      return PointLocation.Boundary
    default:
      return PointLocation.Outside
  }
}

// Points on the boundary count as inside.
export function isPointInsidePolygon(point: Point, polygon: readonly Point[]): boolean {
  return locatePointInPolygon(point, polygon) !== PointLocation.Outside
}

// Returns the ring wound so that its signed area has the requested sign.
export function orientRing(ring: readonly Point[], positive: boolean): Point[] {
  const area = calculatePolygonArea(ring)
  if (area === 0 || area > 0 === positive) {
    return [...ring]
  }
  return [...ring].reverse()
}

// Removes repeated vertices, including a trailing copy of the first vertex.
export function removeConsecutiveDuplicates(ring: readonly Point[]): Point[] {
  const output: Point[] = []
  for (const point of ring) {
    if (output.length === 0 || !pointsEqual(output[output.length - 1], point)) {
      output.push(point)
    }
  }
  while (output.length > 1 && pointsEqual(output[0], output[output.length - 1])) {
    output.pop()
  }
  return output
}

export function countDistinctPoints(points: readonly Point[]): number {
  return new Set(points.map((p) => `${p.x},${p.y}`)).size
}

// Drops duplicate and exactly collinear vertices. No remaining vertex is moved.
export function simplifyRing(ring: readonly Point[]): Point[] {
  let points = removeConsecutiveDuplicates(ring)

  let changed = true
  while (changed && points.length >= 3) {
    changed = false
    const kept: Point[] = []
    for (let i = 0; i < points.length; i++) {
      const previous = kept.length > 0 ? kept[kept.length - 1] : points[points.length - 1]
      const next = points[(i + 1) % points.length]
      if (isLeft(previous, points[i], next) === 0) {
        changed = true
        continue
      }
      kept.push(points[i])
    }
    points = removeConsecutiveDuplicates(kept)
  }

  return points.length >= 3 ? points : []
}
