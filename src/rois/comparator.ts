import { Point } from '../types/base'
import { Roi } from '../types/rois'
import { getPolygonPoints, getRoiBounds } from './measure'

function compareNumbers(a: number, b: number): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

function comparePoints(a: readonly Point[], b: readonly Point[]): number {
  const n = Math.min(a.length, b.length)
  for (let i = 0; i < n; i++) {
    const result = compareNumbers(a[i].x, b[i].x) || compareNumbers(a[i].y, b[i].y)
    if (result !== 0) return result
  }
  return compareNumbers(a.length, b.length)
}

// Orders ROIs by bounds, then plane, then vertices. Usable with Array.prototype.sort.
export function compareRois(a: Roi, b: Roi): number {
  if (a === b) return 0

  const boundsA = getRoiBounds(a)
  const boundsB = getRoiBounds(b)
  const byBounds =
    compareNumbers(boundsA.x, boundsB.x) ||
    compareNumbers(boundsA.y, boundsB.y) ||
    compareNumbers(boundsA.width, boundsB.width) ||
    compareNumbers(boundsA.height, boundsB.height)
  if (byBounds !== 0) return byBounds

  const byPlane =
    compareNumbers(a.plane.z, b.plane.z) ||
    compareNumbers(a.plane.t, b.plane.t) ||
    compareNumbers(a.plane.c, b.plane.c)
  if (byPlane !== 0) return byPlane

  return comparePoints(getPolygonPoints(a), getPolygonPoints(b))
}
