import polygonClipping from 'polygon-clipping'
import { REPAIR_AREA_TOLERANCE, SNAP_TOLERANCE_FACTOR } from '../constants'
import { Point } from '../types/base'
import { PolygonWithHoles, RepairQuality, Ring } from '../types/geometry'
import {
  calculatePolygonArea,
  computePointToPointDistance,
  getBoundingBoxDiagonal,
  getPointsBounds
} from '../utils/geometry'
import { removeConsecutiveDuplicates } from '../utils/polygon'
import { fromClipMultiPolygon, getMultiPolygonArea, toClipPolygon } from './geometry'

export interface RingRepair {
  polygons: PolygonWithHoles[]
  quality: RepairQuality.Safe | RepairQuality.Approximate
  areaBefore: number
  areaAfter: number
  snapTolerance: number
}

export function computeSizeBasedSnapTolerance(ring: Ring): number {
  return getBoundingBoxDiagonal(getPointsBounds(ring)) * SNAP_TOLERANCE_FACTOR
}

// True if the two values differ by no more than `tolerance` relative to their mean magnitude.
export function almostTheSame(a: number, b: number, tolerance: number): boolean {
  if (a === b) return true
  return (2 * Math.abs(a - b)) / (Math.abs(a) + Math.abs(b)) <= tolerance
}

// Moves every vertex within `tolerance` of an earlier vertex onto it.
export function snapRingToSelf(ring: Ring, tolerance: number): Point[] {
  if (tolerance <= 0) {
    return removeConsecutiveDuplicates(ring)
  }

  // Vertices are bucketed on a grid of tolerance-sized cells; candidates sit in adjacent cells.
  const grid = new Map<string, Point[]>()
  const cellOf = (p: Point): [number, number] => [
    Math.floor(p.x / tolerance),
    Math.floor(p.y / tolerance)
  ]

  const snapped = ring.map((point) => {
    const [cx, cy] = cellOf(point)
    for (let dx = -1; dx <= 1; dx++) {
      for (let dy = -1; dy <= 1; dy++) {
        const candidates = grid.get(`${cx + dx},${cy + dy}`) ?? []
        const target = candidates.find(
          (candidate) => computePointToPointDistance(candidate, point) <= tolerance
        )
        if (target) return target
      }
    }

    const key = `${cx},${cy}`
    const cell = grid.get(key)
    if (cell) {
      cell.push(point)
    } else {
      grid.set(key, [point])
    }
    return point
  })

  return removeConsecutiveDuplicates(snapped)
}

// Makes a self-intersecting ring valid by self-snapping, then cleaning it into simple polygons.
export function repairRing(ring: Ring): RingRepair {
  const snapTolerance = computeSizeBasedSnapTolerance(ring)
  const snapped = snapRingToSelf(ring, snapTolerance)

  const polygons =
    snapped.length < 3
      ? []
      : fromClipMultiPolygon(polygonClipping.union(toClipPolygon({ outer: snapped, holes: [] })))

  const areaBefore = Math.abs(calculatePolygonArea(ring))
  const areaAfter = getMultiPolygonArea(polygons)
  const quality = almostTheSame(areaBefore, areaAfter, REPAIR_AREA_TOLERANCE)
    ? RepairQuality.Safe
    : RepairQuality.Approximate

  return { polygons, quality, areaBefore, areaAfter, snapTolerance }
}
