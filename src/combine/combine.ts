import polygonClipping, { MultiPolygon as ClipMultiPolygon } from 'polygon-clipping'
import { RoiConverter } from '../converter/converter'
import { UnsupportedRoiError, createEmptyRoi, getRoiCategory } from '../rois/factory'
import { isRoiEmpty } from '../rois/measure'
import { formatPlane, planesEqual } from '../rois/planes'
import {
  createPolygonalGeometry,
  fromClipMultiPolygon,
  simplifyGeometry,
  toClipMultiPolygon
} from '../topology/geometry'
import { makePrecisePolygons } from '../topology/precision'
import { GeometryType, RepairDiagnostic, RepairQuality, TopologyGeometry } from '../types/geometry'
import { Roi, RoiCategory } from '../types/rois'

export enum CombineOp {
  Union = 'union',
  Difference = 'difference',
  Intersection = 'intersection',
  SymmetricDifference = 'symmetricDifference'
}

export class PlaneMismatchError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PlaneMismatchError'
  }
}

export interface CombineResult {
  roi: Roi
  diagnostics: RepairDiagnostic[]
}

function checkPlanes(a: Roi, b: Roi): void {
  if (!planesEqual(a.plane, b.plane)) {
    throw new PlaneMismatchError(
      `Cannot combine ROIs on different planes (${formatPlane(a.plane)} and ` +
        `${formatPlane(b.plane)})`
    )
  }
}

function checkArea(roi: Roi): void {
  if (getRoiCategory(roi) !== RoiCategory.Area) {
    throw new UnsupportedRoiError(`Cannot combine a ${roi.type} ROI; only area ROIs are supported`)
  }
}

function toClip(geometry: TopologyGeometry): ClipMultiPolygon {
  return geometry.type === GeometryType.MultiPolygon ? toClipMultiPolygon(geometry.polygons) : []
}

function getQuality(...geometries: TopologyGeometry[]): RepairQuality {
  let quality = RepairQuality.None
  for (const geometry of geometries) {
    if (geometry.type !== GeometryType.MultiPolygon || quality === RepairQuality.Approximate) {
      continue
    }
    if (geometry.quality !== RepairQuality.None) {
      quality = geometry.quality
    }
  }
  return quality
}

// Combining with an empty ROI needs no geometry: the result is one of the inputs or empty.
function combineWithEmpty(a: Roi, b: Roi, op: CombineOp): Roi | null {
  const emptyA = isRoiEmpty(a)
  const emptyB = isRoiEmpty(b)
  if (!emptyA && !emptyB) return null

  switch (op) {
    case CombineOp.Union:
    case CombineOp.SymmetricDifference:
      if (emptyA && emptyB) return createEmptyRoi(a.plane)
      return emptyA ? b : a
    case CombineOp.Difference:
      return emptyA ? createEmptyRoi(a.plane) : a
    case CombineOp.Intersection:
      return createEmptyRoi(a.plane)
  }
}

function applyOperation(
  a: ClipMultiPolygon,
  b: ClipMultiPolygon,
  op: CombineOp
): ClipMultiPolygon {
  switch (op) {
    case CombineOp.Union:
      return polygonClipping.union(a, b)
    case CombineOp.Difference:
      return polygonClipping.difference(a, b)
    case CombineOp.Intersection:
      return polygonClipping.intersection(a, b)
    case CombineOp.SymmetricDifference:
      return polygonClipping.xor(a, b)
  }
}

// Combines two area ROIs on the same plane. Repairs made while converting either input are
// returned alongside the result.
export function combine(
  a: Roi,
  b: Roi,
  op: CombineOp,
  converter: RoiConverter = RoiConverter.getDefault()
): CombineResult {
  checkPlanes(a, b)
  checkArea(a)
  checkArea(b)

  const shortcut = combineWithEmpty(a, b, op)
  if (shortcut) {
    return { roi: shortcut, diagnostics: [] }
  }

  const resultA = converter.roiToGeometry(a)
  const resultB = converter.roiToGeometry(b)
  const polygons = makePrecisePolygons(
    fromClipMultiPolygon(applyOperation(toClip(resultA.geometry), toClip(resultB.geometry), op)),
    converter.config.precisionModel
  )
  const geometry = simplifyGeometry(
    createPolygonalGeometry(polygons, getQuality(resultA.geometry, resultB.geometry))
  )

  return {
    roi: converter.geometryToRoi(geometry, a.plane),
    diagnostics: [...resultA.diagnostics, ...resultB.diagnostics]
  }
}

export function combineRois(
  a: Roi,
  b: Roi,
  op: CombineOp,
  converter: RoiConverter = RoiConverter.getDefault()
): Roi {
  return combine(a, b, op, converter).roi
}

// Union of one or more area ROIs sharing a plane.
export function unionRois(
  rois: readonly Roi[],
  converter: RoiConverter = RoiConverter.getDefault()
): Roi {
  const [first, ...rest] = rois
  if (!first) {
    throw new UnsupportedRoiError('Cannot take the union of an empty list of ROIs')
  }
  for (const roi of rois) {
    checkPlanes(first, roi)
    checkArea(roi)
  }
  if (rest.length === 0) {
    return first
  }

  const nonEmpty = rois.filter((roi) => !isRoiEmpty(roi))
  if (nonEmpty.length === 0) {
    return createEmptyRoi(first.plane)
  }

  const geometries = nonEmpty.map((roi) => converter.roiToGeometry(roi).geometry)
  const [head, ...tail] = geometries.map(toClip)
  const polygons = makePrecisePolygons(
    fromClipMultiPolygon(polygonClipping.union(head, ...tail)),
    converter.config.precisionModel
  )
  const geometry = simplifyGeometry(createPolygonalGeometry(polygons, getQuality(...geometries)))
  return converter.geometryToRoi(geometry, first.plane)
}
