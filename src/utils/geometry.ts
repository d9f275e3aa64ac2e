import { BoundingBox, LineSegment, Point } from '../types/base'

interface SweepSegment extends LineSegment {
  index: number
  xMin: number
  xMax: number
  yMin: number
  yMax: number
}

export function computePointToPointDistance(point1: Point, point2: Point): number {
  return Math.sqrt((point1.x - point2.x) ** 2 + (point1.y - point2.y) ** 2)
}

export function pointsEqual(point1: Point, point2: Point): boolean {
  return point1.x === point2.x && point1.y === point2.y
}

export function isLeft(lineStart: Point, lineEnd: Point, point: Point): number {
  // The 2D cross product of AB and AP vectors.
  return (
    (lineEnd.x - lineStart.x) * (point.y - lineStart.y) -
    (point.x - lineStart.x) * (lineEnd.y - lineStart.y)
  )
}

export function calculateCentroid(points: readonly Point[]): Point {
  if (points.length === 0) {
    return { x: NaN, y: NaN }
  }

  let sumX = 0
  let sumY = 0

  for (const point of points) {
    sumX += point.x
    sumY += point.y
  }

  return {
    x: sumX / points.length,
    y: sumY / points.length
  }
}

export function calculatePolygonArea(points: readonly Point[]): number {
  // Signed area by the shoelace formula; positive when counterclockwise in a y-up frame.
  // https://en.wikipedia.org/wiki/Shoelace_formula
  let area = 0
  const n = points.length

  for (let i = 0; i < n; i++) {
    const j = (i + 1) % n
    area += points[i].x * points[j].y
    area -= points[j].x * points[i].y
  }

  return area / 2
}

// Area-weighted centroid of a closed ring. Falls back to the vertex mean for rings without area.
export function calculatePolygonCentroid(points: readonly Point[]): Point {
  const n = points.length
  let area = 0
  let cx = 0
  let cy = 0

  for (let i = 0; i < n; i++) {
    const p1 = points[i]
    const p2 = points[(i + 1) % n]
    const cross = p1.x * p2.y - p2.x * p1.y
    area += cross
    cx += (p1.x + p2.x) * cross
    cy += (p1.y + p2.y) * cross
  }

  if (area === 0) {
    return calculateCentroid(points)
  }

  return { x: cx / (3 * area), y: cy / (3 * area) }
}

export function calculatePolylineLength(points: readonly Point[]): number {
  let length = 0
  for (let i = 1; i < points.length; i++) {
    length += computePointToPointDistance(points[i - 1], points[i])
  }
  return length
}

export function calculateRingPerimeter(points: readonly Point[]): number {
  if (points.length < 2) return 0
  return (
    calculatePolylineLength(points) +
    computePointToPointDistance(points[points.length - 1], points[0])
  )
}

export function getPointsBounds(points: readonly Point[]): BoundingBox {
  if (points.length === 0) {
    return { x: 0, y: 0, width: 0, height: 0 }
  }

  let xMin = Infinity
  let yMin = Infinity
  let xMax = -Infinity
  let yMax = -Infinity

  for (const point of points) {
    xMin = Math.min(xMin, point.x)
    yMin = Math.min(yMin, point.y)
    xMax = Math.max(xMax, point.x)
    yMax = Math.max(yMax, point.y)
  }

  return { x: xMin, y: yMin, width: xMax - xMin, height: yMax - yMin }
}

export function getBoundingBoxDiagonal(box: BoundingBox): number {
  return Math.hypot(box.width, box.height)
}

function isWithinSegmentBox(segmentStart: Point, segmentEnd: Point, point: Point): boolean {
  return (
    point.x >= Math.min(segmentStart.x, segmentEnd.x) &&
    point.x <= Math.max(segmentStart.x, segmentEnd.x) &&
    point.y >= Math.min(segmentStart.y, segmentEnd.y) &&
    point.y <= Math.max(segmentStart.y, segmentEnd.y)
  )
}

// Returns a point shared by the two segments, or null if they are disjoint. Touching counts.
export function findSegmentIntersection(
  segmentA: LineSegment,
  segmentB: LineSegment
): Point | null {
  const { start: p1, end: p2 } = segmentA
  const { start: p3, end: p4 } = segmentB

  const d1 = isLeft(p3, p4, p1)
  const d2 = isLeft(p3, p4, p2)
  const d3 = isLeft(p1, p2, p3)
  const d4 = isLeft(p1, p2, p4)

  const properA = (d1 > 0 && d2 < 0) || (d1 < 0 && d2 > 0)
  const properB = (d3 > 0 && d4 < 0) || (d3 < 0 && d4 > 0)

  if (properA && properB) {
    // Use Cramer's Rule to find the crossing on segment A.
    const rx = p2.x - p1.x
    const ry = p2.y - p1.y
    const sx = p4.x - p3.x
    const sy = p4.y - p3.y
    const det = rx * sy - ry * sx
    const ua = ((p3.x - p1.x) * sy - (p3.y - p1.y) * sx) / det
    return { x: p1.x + ua * rx, y: p1.y + ua * ry }
  }

  // Touching and collinear overlaps.
  if (d1 === 0 && isWithinSegmentBox(p3, p4, p1)) return p1
  if (d2 === 0 && isWithinSegmentBox(p3, p4, p2)) return p2
  if (d3 === 0 && isWithinSegmentBox(p1, p2, p3)) return p3
  if (d4 === 0 && isWithinSegmentBox(p1, p2, p4)) return p4

  return null
}

function areRingNeighbours(i: number, j: number, n: number): boolean {
  return j === (i + 1) % n || i === (j + 1) % n
}

// Finds a point where a closed ring touches or crosses itself, or null if the ring is simple.
// Consecutive duplicate vertices are ignored.
export function findRingSelfIntersection(ring: readonly Point[]): Point | null {
  const points = ring.filter((p, i) => !pointsEqual(p, ring[(i + 1) % ring.length]))
  const n = points.length
  if (n < 3) return null

  const segments: SweepSegment[] = points.map((start, index) => {
    const end = points[(index + 1) % n]
    return {
      start,
      end,
      index,
      xMin: Math.min(start.x, end.x),
      xMax: Math.max(start.x, end.x),
      yMin: Math.min(start.y, end.y),
      yMax: Math.max(start.y, end.y)
    }
  })

  // Neighbouring segments share a vertex; they are only invalid when one folds back on the other.
  for (let i = 0; i < n; i++) {
    const previous = segments[(i + n - 1) % n]
    const current = segments[i]
    const ux = previous.end.x - previous.start.x
    const uy = previous.end.y - previous.start.y
    const vx = current.end.x - current.start.x
    const vy = current.end.y - current.start.y
    if (ux * vy - uy * vx === 0 && ux * vx + uy * vy < 0) {
      return current.start
    }
  }

  // Sweep over segments sorted by their left edge.
  const sorted = [...segments].sort((a, b) => a.xMin - b.xMin)
  for (let a = 0; a < sorted.length; a++) {
    const segmentA = sorted[a]
    for (let b = a + 1; b < sorted.length; b++) {
      const segmentB = sorted[b]
      if (segmentB.xMin > segmentA.xMax) break
      if (segmentB.yMin > segmentA.yMax || segmentB.yMax < segmentA.yMin) continue
      if (areRingNeighbours(segmentA.index, segmentB.index, n)) continue

      const intersection = findSegmentIntersection(segmentA, segmentB)
      if (intersection) {
        return intersection
      }
    }
  }

  return null
}
