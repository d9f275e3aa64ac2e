import polygonClipping, {
  MultiPolygon as ClipMultiPolygon,
  Pair,
  Polygon as ClipPolygon
} from 'polygon-clipping'
import { SNAP_TOLERANCE_FACTOR } from '../constants'
import { BoundingBox, Point } from '../types/base'
import {
  EmptyGeometry,
  GeometryType,
  MultiPolygonGeometry,
  PolygonWithHoles,
  RepairQuality,
  Ring,
  TopologyGeometry
} from '../types/geometry'
import {
  calculateCentroid,
  calculatePolygonArea,
  calculatePolygonCentroid,
  calculatePolylineLength,
  calculateRingPerimeter,
  findRingSelfIntersection,
  getBoundingBoxDiagonal,
  getPointsBounds
} from '../utils/geometry'
import { orientRing, removeConsecutiveDuplicates, simplifyRing } from '../utils/polygon'

export const EMPTY_GEOMETRY: EmptyGeometry = Object.freeze<EmptyGeometry>({
  type: GeometryType.Empty
})

// polygon-clipping takes explicitly closed rings of coordinate pairs.
function toClipRing(ring: Ring): Pair[] {
  const pairs = ring.map((p): Pair => [p.x, p.y])
  if (pairs.length > 0) {
    pairs.push([ring[0].x, ring[0].y])
  }
  return pairs
}

export function toClipPolygon(polygon: PolygonWithHoles): ClipPolygon {
  return [toClipRing(polygon.outer), ...polygon.holes.map(toClipRing)]
}

export function toClipMultiPolygon(polygons: readonly PolygonWithHoles[]): ClipMultiPolygon {
  return polygons.map(toClipPolygon)
}

export function fromClipMultiPolygon(multiPolygon: ClipMultiPolygon): PolygonWithHoles[] {
  const toRing = (pairs: Pair[]): Point[] =>
    removeConsecutiveDuplicates(pairs.map(([x, y]) => ({ x, y })))

  const polygons: PolygonWithHoles[] = []
  for (const [outer, ...holes] of multiPolygon) {
    if (!outer) continue
    polygons.push({ outer: toRing(outer), holes: holes.map(toRing) })
  }
  return polygons
}

export function createPolygonalGeometry(
  polygons: readonly PolygonWithHoles[],
  quality: RepairQuality = RepairQuality.None
): TopologyGeometry {
  if (polygons.length === 0) {
    return EMPTY_GEOMETRY
  }
  return Object.freeze<MultiPolygonGeometry>({
    type: GeometryType.MultiPolygon,
    polygons: Object.freeze(
      polygons.map((polygon) =>
        Object.freeze({
          outer: Object.freeze([...polygon.outer]),
          holes: Object.freeze(polygon.holes.map((hole) => Object.freeze([...hole])))
        })
      )
    ),
    quality
  })
}

// Zero-tolerance simplification: removes duplicate and collinear vertices, never moves one.
export function simplifyGeometry(geometry: TopologyGeometry): TopologyGeometry {
  if (geometry.type !== GeometryType.MultiPolygon) {
    return geometry
  }

  const polygons: PolygonWithHoles[] = []
  for (const polygon of geometry.polygons) {
    const outer = simplifyRing(polygon.outer)
    if (outer.length === 0) continue
    const holes = polygon.holes.map(simplifyRing).filter((hole) => hole.length > 0)
    polygons.push({ outer, holes })
  }
  return createPolygonalGeometry(polygons, geometry.quality)
}

function polygonArea(polygon: PolygonWithHoles): number {
  return (
    Math.abs(calculatePolygonArea(polygon.outer)) -
    polygon.holes.reduce((sum, hole) => sum + Math.abs(calculatePolygonArea(hole)), 0)
  )
}

export function getMultiPolygonArea(polygons: readonly PolygonWithHoles[]): number {
  return polygons.reduce((total, polygon) => total + polygonArea(polygon), 0)
}

function getAllPoints(geometry: TopologyGeometry): readonly Point[] {
  switch (geometry.type) {
    case GeometryType.Empty:
      return []
    case GeometryType.Point:
      return [geometry.point]
    case GeometryType.MultiPoint:
    case GeometryType.LineString:
      return geometry.points
    case GeometryType.MultiPolygon:
      return geometry.polygons.flatMap((polygon) => [
        ...polygon.outer,
        ...polygon.holes.flatMap((hole) => [...hole])
      ])
  }
}

export function getGeometryArea(geometry: TopologyGeometry): number {
  return geometry.type === GeometryType.MultiPolygon ? getMultiPolygonArea(geometry.polygons) : 0
}

// Line length, or total ring perimeter for polygons.
export function getGeometryLength(geometry: TopologyGeometry): number {
  switch (geometry.type) {
    case GeometryType.LineString:
      return calculatePolylineLength(geometry.points)
    case GeometryType.MultiPolygon:
      return getGeometryRings(geometry).reduce(
        (total, ring) => total + calculateRingPerimeter(ring),
        0
      )
    default:
      return 0
  }
}

export function getGeometryBounds(geometry: TopologyGeometry): BoundingBox {
  if (geometry.type === GeometryType.MultiPolygon) {
    return getPointsBounds(geometry.polygons.flatMap((polygon) => polygon.outer))
  }
  return getPointsBounds(getAllPoints(geometry))
}

export function getGeometryCentroid(geometry: TopologyGeometry): Point {
  if (geometry.type !== GeometryType.MultiPolygon) {
    return calculateCentroid(getAllPoints(geometry))
  }

  let area = 0
  let cx = 0
  let cy = 0
  for (const ring of getGeometryRings(geometry)) {
    const ringArea = calculatePolygonArea(ring)
    const centroid = calculatePolygonCentroid(ring)
    area += ringArea
    cx += centroid.x * ringArea
    cy += centroid.y * ringArea
  }
  if (area === 0) {
    return calculateCentroid(getAllPoints(geometry))
  }
  return { x: cx / area, y: cy / area }
}

export function getGeometryRingCount(geometry: TopologyGeometry): number {
  if (geometry.type !== GeometryType.MultiPolygon) {
    return 0
  }
  return geometry.polygons.reduce((total, polygon) => total + 1 + polygon.holes.length, 0)
}

export function getGeometryNumPoints(geometry: TopologyGeometry): number {
  return getAllPoints(geometry).length
}

export function isGeometryEmpty(geometry: TopologyGeometry): boolean {
  return getAllPoints(geometry).length === 0
}

function isRingValid(ring: Ring): boolean {
  return ring.length >= 3 && calculatePolygonArea(ring) !== 0 && !findRingSelfIntersection(ring)
}

function boundsOverlap(a: BoundingBox, b: BoundingBox): boolean {
  return (
    a.x <= b.x + b.width && b.x <= a.x + a.width && a.y <= b.y + b.height && b.y <= a.y + a.height
  )
}

function getClipArea(multiPolygon: ClipMultiPolygon): number {
  return getMultiPolygonArea(fromClipMultiPolygon(multiPolygon))
}

// True if any two of the shapes share more than `areaTolerance` of interior.
// Shapes that only touch along edges or at vertices do not overlap.
function hasOverlap(shapes: readonly PolygonWithHoles[], areaTolerance: number): boolean {
  const bounds = shapes.map((shape) => getPointsBounds(shape.outer))
  for (let i = 0; i < shapes.length; i++) {
    for (let j = i + 1; j < shapes.length; j++) {
      if (!boundsOverlap(bounds[i], bounds[j])) continue
      const overlap = polygonClipping.intersection(
        toClipPolygon(shapes[i]),
        toClipPolygon(shapes[j])
      )
      if (getClipArea(overlap) > areaTolerance) {
        return true
      }
    }
  }
  return false
}

function isPolygonValid(polygon: PolygonWithHoles, areaTolerance: number): boolean {
  if (!isRingValid(polygon.outer) || !polygon.holes.every(isRingValid)) {
    return false
  }

  const outer = toClipPolygon({ outer: polygon.outer, holes: [] })
  const holes = polygon.holes.map((hole) => ({ outer: hole, holes: [] }))

  // Holes may touch the outer ring but no part of one may lie outside it.
  for (const hole of holes) {
    if (getClipArea(polygonClipping.difference(toClipPolygon(hole), outer)) > areaTolerance) {
      return false
    }
  }
  return !hasOverlap(holes, areaTolerance)
}

// Every ring is simple and encloses area, every hole lies within its outer ring, and no two
// holes or polygons overlap. Boundaries may touch. Overlaps thinner than the snap tolerance
// are rounding noise from clipping and are ignored.
export function isGeometryValid(geometry: TopologyGeometry): boolean {
  const finite = getAllPoints(geometry).every((p) => Number.isFinite(p.x) && Number.isFinite(p.y))
  if (!finite) return false

  switch (geometry.type) {
    case GeometryType.Empty:
    case GeometryType.Point:
    case GeometryType.MultiPoint:
      return true
    case GeometryType.LineString:
      return geometry.points.length >= 2
    case GeometryType.MultiPolygon: {
      const diagonal = getBoundingBoxDiagonal(getGeometryBounds(geometry))
      const areaTolerance = diagonal * diagonal * SNAP_TOLERANCE_FACTOR
      return (
        geometry.polygons.every((polygon) => isPolygonValid(polygon, areaTolerance)) &&
        !hasOverlap(geometry.polygons, areaTolerance)
      )
    }
  }
}

// Outer rings wound positive, holes negative, in polygon order.
export function getGeometryRings(geometry: MultiPolygonGeometry): Ring[] {
  return geometry.polygons.flatMap((polygon) => [
    orientRing(polygon.outer, true),
    ...polygon.holes.map((hole) => orientRing(hole, false))
  ])
}
