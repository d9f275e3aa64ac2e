import polygonClipping, {
  MultiPolygon as ClipMultiPolygon,
  Polygon as ClipPolygon
} from 'polygon-clipping'
import {
  ConversionResult,
  GeometryType,
  PolygonWithHoles,
  RepairDiagnostic,
  RepairQuality,
  Ring,
  TopologyGeometry
} from '../types/geometry'
import { DiagnosticLogger, PrecisionModel } from '../types/options'
import { calculatePolygonArea, findRingSelfIntersection } from '../utils/geometry'
import {
  EMPTY_GEOMETRY,
  createPolygonalGeometry,
  fromClipMultiPolygon,
  getGeometryRings,
  simplifyGeometry,
  toClipPolygon
} from './geometry'
import { FLOATING_PRECISION, makePrecisePolygons } from './precision'
import { repairRing } from './repair'

export interface BuildOptions {
  logger?: DiagnosticLogger
  // Grid that output vertices are rounded to, including those made by clipping.
  precisionModel?: PrecisionModel
}

interface RingEntry {
  ring: Ring
  index: number
}

function unionAll(polygons: ClipPolygon[]): ClipMultiPolygon {
  const [first, ...rest] = polygons
  return first ? polygonClipping.union(first, ...rest) : []
}

// Builds a valid polygonal geometry from closed rings.
//
// Rings are split by the sign of their area. The sign of the total area decides which set
// holds the outer boundaries; the other set holds the holes. Outer boundaries are unioned and
// the union of the holes is subtracted. Self-intersecting rings are repaired first and
// reported in the diagnostics.
export function buildGeometry(
  rings: readonly Ring[],
  options: BuildOptions = {}
): ConversionResult {
  const logger = options.logger ?? console
  const precisionModel = options.precisionModel ?? FLOATING_PRECISION

  let areaCached = 0
  const positive: RingEntry[] = []
  const negative: RingEntry[] = []

  rings.forEach((ring, index) => {
    const area = calculatePolygonArea(ring)
    areaCached += area
    if (area > 0) {
      positive.push({ ring, index })
    } else if (area < 0) {
      negative.push({ ring, index })
    }
    // Zero area rings enclose nothing.
  })

  if (areaCached === 0) {
    return { geometry: EMPTY_GEOMETRY, diagnostics: [] }
  }

  const [outers, holes] = areaCached > 0 ? [positive, negative] : [negative, positive]
  const diagnostics: RepairDiagnostic[] = []

  const toPolygons = ({ ring, index }: RingEntry): PolygonWithHoles[] => {
    const location = findRingSelfIntersection(ring)
    if (!location) {
      return [{ outer: ring, holes: [] }]
    }

    logger.debug(`Invalid ring ${index} detected at (${location.x}, ${location.y}), repairing`)
    const repair = repairRing(ring)
    const diagnostic: RepairDiagnostic = {
      ringIndex: index,
      quality: repair.quality,
      location,
      areaBefore: repair.areaBefore,
      areaAfter: repair.areaAfter,
      snapTolerance: repair.snapTolerance
    }
    diagnostics.push(diagnostic)

    if (repair.quality === RepairQuality.Approximate) {
      logger.warn(
        `Unable to repair ring ${index} exactly (area before: ${repair.areaBefore}, ` +
          `area after: ${repair.areaAfter}), proceeding with the repaired ring`,
        diagnostic
      )
    } else {
      logger.debug(
        `Ring ${index} repaired (area before: ${repair.areaBefore}, ` +
          `area after: ${repair.areaAfter})`
      )
    }
    return repair.polygons
  }

  const outerPolygons = outers.flatMap(toPolygons)
  const holePolygons = holes.flatMap(toPolygons)

  let quality = RepairQuality.None
  for (const diagnostic of diagnostics) {
    if (quality !== RepairQuality.Approximate) {
      quality = diagnostic.quality
    }
  }

  let polygons: PolygonWithHoles[]
  if (diagnostics.length === 0 && outerPolygons.length === 1 && holePolygons.length === 0) {
    // The union of a single simple ring is itself; keep its coordinates as they are.
    polygons = outerPolygons
  } else {
    let result = unionAll(outerPolygons.map(toClipPolygon))
    if (holePolygons.length > 0) {
      result = polygonClipping.difference(result, unionAll(holePolygons.map(toClipPolygon)))
    }
    polygons = fromClipMultiPolygon(result)
  }
  polygons = makePrecisePolygons(polygons, precisionModel)

  return { geometry: simplifyGeometry(createPolygonalGeometry(polygons, quality)), diagnostics }
}

// Runs the builder again on a geometry's own rings.
export function rebuildGeometry(
  geometry: TopologyGeometry,
  options: BuildOptions = {}
): ConversionResult {
  if (geometry.type !== GeometryType.MultiPolygon) {
    return { geometry, diagnostics: [] }
  }
  return buildGeometry(getGeometryRings(geometry), options)
}
