import { DEFAULT_FLATNESS } from '../constants'
import { flattenRoi } from '../paths/flattener'
import {
  UnsupportedRoiError,
  createCompositeRoi,
  createEmptyRoi,
  createLineRoi,
  createPointsRoi,
  createPolygonRoi,
  createPolylineRoi
} from '../rois/factory'
import { DEFAULT_PLANE } from '../rois/planes'
import { buildGeometry } from '../topology/builder'
import { makePrecisePoints } from '../topology/precision'
import { ImagePlane, Point } from '../types/base'
import { ConversionResult, GeometryType, Ring, TopologyGeometry } from '../types/geometry'
import {
  ConverterConfig,
  ConverterOptions,
  PrecisionModel,
  PrecisionModelType
} from '../types/options'
import { Roi, RoiType } from '../types/rois'
import { Transform } from '../utils/transform'

export class ConverterConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConverterConfigError'
  }
}

function unsupportedRoi(roi: never): never {
  throw new UnsupportedRoiError(`Unsupported ROI type: ${JSON.stringify(roi)}`)
}

function checkPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConverterConfigError(`${name} must be a finite positive number, got ${value}`)
  }
}

function validateOptions(options: ConverterOptions): ConverterConfig {
  const precisionModel: PrecisionModel = options.precisionModel ?? {
    type: PrecisionModelType.Floating
  }
  const config: ConverterConfig = {
    pixelWidth: options.pixelWidth ?? 1,
    pixelHeight: options.pixelHeight ?? 1,
    flatness: options.flatness ?? DEFAULT_FLATNESS,
    precisionModel: Object.freeze({ ...precisionModel }),
    logger: options.logger ?? console
  }

  checkPositive('pixelWidth', config.pixelWidth)
  checkPositive('pixelHeight', config.pixelHeight)
  checkPositive('flatness', config.flatness)
  if (config.precisionModel.type === PrecisionModelType.Fixed) {
    checkPositive('precisionModel.scale', config.precisionModel.scale)
  } else if (config.precisionModel.type !== PrecisionModelType.Floating) {
    throw new ConverterConfigError(`Unknown precision model: ${JSON.stringify(precisionModel)}`)
  }
  if (typeof config.logger.debug !== 'function' || typeof config.logger.warn !== 'function') {
    throw new ConverterConfigError('logger must provide debug and warn methods')
  }

  return Object.freeze(config)
}

// Converts between ROIs in pixel coordinates and geometry in calibrated units.
// Instances are immutable; build a new converter to change the configuration.
export class RoiConverter {
  private static defaultConverter: RoiConverter | null = null

  public readonly config: ConverterConfig
  private readonly toGeometryTransform: Transform
  private readonly toRoiTransform: Transform

  constructor(options: ConverterOptions = {}) {
    this.config = validateOptions(options)
    const { pixelWidth, pixelHeight } = this.config
    this.toGeometryTransform = Transform.scale(pixelWidth, pixelHeight)
    this.toRoiTransform = Transform.scale(1 / pixelWidth, 1 / pixelHeight)
    Object.freeze(this)
  }

  // Shared converter with the default options, built on first use.
  static getDefault(): RoiConverter {
    if (!RoiConverter.defaultConverter) {
      RoiConverter.defaultConverter = new RoiConverter()
    }
    return RoiConverter.defaultConverter
  }

  private toGeometryPoints(points: readonly Point[]): Point[] {
    return makePrecisePoints(
      this.toGeometryTransform.transformPoints(points),
      this.config.precisionModel
    )
  }

  private toRoiPoints(points: readonly Point[]): Point[] {
    return this.toRoiTransform.transformPoints(points)
  }

  roiToGeometry(roi: Roi): ConversionResult {
    switch (roi.type) {
      case RoiType.Rectangle:
      case RoiType.Ellipse:
      case RoiType.Polygon:
      case RoiType.Composite: {
        // Scaling happens before flattening so that flatness applies in calibrated units.
        const { flatness, logger, precisionModel } = this.config
        const rings: Ring[] = flattenRoi(roi, flatness, this.toGeometryTransform).map((ring) =>
          makePrecisePoints(ring, precisionModel)
        )
        return buildGeometry(rings, { logger, precisionModel })
      }
      case RoiType.Line: {
        const points = this.toGeometryPoints([
          { x: roi.x1, y: roi.y1 },
          { x: roi.x2, y: roi.y2 }
        ])
        return { geometry: { type: GeometryType.LineString, points }, diagnostics: [] }
      }
      case RoiType.Polyline:
        return {
          geometry: { type: GeometryType.LineString, points: this.toGeometryPoints(roi.points) },
          diagnostics: []
        }
      case RoiType.Points: {
        const points = this.toGeometryPoints(roi.points)
        const geometry: TopologyGeometry =
          points.length === 1
            ? { type: GeometryType.Point, point: points[0] }
            : { type: GeometryType.MultiPoint, points }
        return { geometry, diagnostics: [] }
      }
      default:
        return unsupportedRoi(roi)
    }
  }

  geometryToRoi(geometry: TopologyGeometry, plane: ImagePlane = DEFAULT_PLANE): Roi {
    switch (geometry.type) {
      case GeometryType.Empty:
        return createEmptyRoi(plane)
      case GeometryType.Point:
        return createPointsRoi(this.toRoiPoints([geometry.point]), plane)
      case GeometryType.MultiPoint:
        return createPointsRoi(this.toRoiPoints(geometry.points), plane)
      case GeometryType.LineString: {
        const points = this.toRoiPoints(geometry.points)
        if (points.length === 2) {
          const [start, end] = points
          return createLineRoi(start.x, start.y, end.x, end.y, plane)
        }
        return createPolylineRoi(points, plane)
      }
      case GeometryType.MultiPolygon: {
        const polygons = geometry.polygons.map((polygon) => ({
          outer: this.toRoiPoints(polygon.outer),
          holes: polygon.holes.map((hole) => this.toRoiPoints(hole))
        }))
        if (polygons.length === 1 && polygons[0].holes.length === 0) {
          return createPolygonRoi(polygons[0].outer, plane)
        }
        return createCompositeRoi(polygons, plane)
      }
    }
  }

  // Passes an area ROI through the topology builder, returning a valid equivalent.
  normalizeRoi(roi: Roi): Roi {
    return this.geometryToRoi(this.roiToGeometry(roi).geometry, roi.plane)
  }
}

export function roiToGeometry(roi: Roi, converter = RoiConverter.getDefault()): ConversionResult {
  return converter.roiToGeometry(roi)
}

export function geometryToRoi(
  geometry: TopologyGeometry,
  plane: ImagePlane = DEFAULT_PLANE,
  converter = RoiConverter.getDefault()
): Roi {
  return converter.geometryToRoi(geometry, plane)
}
