export * from './constants'
export * from './types/base'
export * from './types/rois'
export * from './types/paths'
export * from './types/geometry'
export * from './types/options'
export { RoiTypeCode } from './types/format'

export { DEFAULT_PLANE, planesEqual, formatPlane } from './rois/planes'
export {
  RoiCreationError,
  UnsupportedRoiError,
  createPlane,
  createRectangleRoi,
  createEllipseRoi,
  createPolygonRoi,
  createCompositeRoi,
  createEmptyRoi,
  createLineRoi,
  createPolylineRoi,
  createPointsRoi,
  getRoiCategory
} from './rois/factory'
export { getRoiPath } from './rois/shape'
export {
  getRoiBounds,
  getRoiArea,
  getRoiLength,
  getRoiCentroid,
  roiContainsPoint,
  getPolygonPoints,
  getRoiNumPoints,
  isRoiEmpty
} from './rois/measure'
export { translateRoi, scaleRoi, updateRoiPlane } from './rois/transform_roi'
export { compareRois } from './rois/comparator'

export { flattenPath, flattenRoi } from './paths/flattener'

export { buildGeometry, rebuildGeometry } from './topology/builder'
export type { BuildOptions } from './topology/builder'
export {
  EMPTY_GEOMETRY,
  simplifyGeometry,
  getGeometryArea,
  getGeometryLength,
  getGeometryBounds,
  getGeometryCentroid,
  getGeometryRingCount,
  getGeometryNumPoints,
  isGeometryEmpty,
  isGeometryValid
} from './topology/geometry'
export { almostTheSame, repairRing } from './topology/repair'

export {
  ConverterConfigError,
  RoiConverter,
  roiToGeometry,
  geometryToRoi
} from './converter/converter'
export type { CombineResult } from './combine/combine'
export {
  CombineOp,
  PlaneMismatchError,
  combine,
  combineRois,
  unionRois
} from './combine/combine'

export { RoiReader, RoiReadError, deserializeRoi } from './reader/roi_reader'
export { RoiWriter, RoiWriteError, serializeRoi } from './writer/roi_writer'

export { Transform } from './utils/transform'
