import {
  createCompositeRoi,
  createEllipseRoi,
  createLineRoi,
  createPlane,
  createPointsRoi,
  createPolygonRoi,
  createPolylineRoi,
  createRectangleRoi
} from '../rois/factory'
import { ImagePlane, Point } from '../types/base'
import {
  ROI_FORMAT_MAGIC,
  ROI_FORMAT_VERSION,
  ROI_HEADER_LENGTH,
  RoiTypeCode
} from '../types/format'
import { Roi } from '../types/rois'

export class RoiReadError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'RoiReadError'
  }
}

// Reads little-endian fields, failing on any read past the end.
class ByteSource {
  private readonly view: DataView
  private offset = 0

  constructor(bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  private take(length: number): number {
    if (this.offset + length > this.view.byteLength) {
      throw new RoiReadError(
        `Unexpected end of data at byte ${this.offset} (needed ${length} more bytes)`
      )
    }
    const start = this.offset
    this.offset += length
    return start
  }

  get remaining(): number {
    return this.view.byteLength - this.offset
  }

  readUint8(): number {
    return this.view.getUint8(this.take(1))
  }

  readInt32(): number {
    return this.view.getInt32(this.take(4), true)
  }

  readUint32(): number {
    return this.view.getUint32(this.take(4), true)
  }

  readFloat64(): number {
    return this.view.getFloat64(this.take(8), true)
  }
}

export class RoiReader {
  private readPoints(source: ByteSource): Point[] {
    const count = source.readUint32()
    // Each point takes 16 bytes; reject counts the data cannot hold before allocating.
    if (count * 16 > source.remaining) {
      throw new RoiReadError(`Point count ${count} exceeds the remaining data`)
    }
    const points: Point[] = []
    for (let i = 0; i < count; i++) {
      points.push({ x: source.readFloat64(), y: source.readFloat64() })
    }
    return points
  }

  private readPayload(source: ByteSource, typeCode: number, plane: ImagePlane): Roi {
    switch (typeCode) {
      case RoiTypeCode.Rectangle:
      case RoiTypeCode.Ellipse: {
        const x = source.readFloat64()
        const y = source.readFloat64()
        const width = source.readFloat64()
        const height = source.readFloat64()
        return typeCode === RoiTypeCode.Rectangle
          ? createRectangleRoi(x, y, width, height, plane)
          : createEllipseRoi(x, y, width, height, plane)
      }
      case RoiTypeCode.Line: {
        const x1 = source.readFloat64()
        const y1 = source.readFloat64()
        const x2 = source.readFloat64()
        const y2 = source.readFloat64()
        return createLineRoi(x1, y1, x2, y2, plane)
      }
      case RoiTypeCode.Polygon:
        return createPolygonRoi(this.readPoints(source), plane)
      case RoiTypeCode.Polyline:
        return createPolylineRoi(this.readPoints(source), plane)
      case RoiTypeCode.Points:
        return createPointsRoi(this.readPoints(source), plane)
      case RoiTypeCode.Composite: {
        const polygonCount = source.readUint32()
        const polygons: { outer: Point[]; holes: Point[][] }[] = []
        for (let i = 0; i < polygonCount; i++) {
          const ringCount = source.readUint32()
          if (ringCount === 0) {
            throw new RoiReadError(`Polygon ${i} has no outer ring`)
          }
          const outer = this.readPoints(source)
          const holes: Point[][] = []
          for (let j = 1; j < ringCount; j++) {
            holes.push(this.readPoints(source))
          }
          polygons.push({ outer, holes })
        }
        return createCompositeRoi(polygons, plane)
      }
      default:
        throw new RoiReadError(`Unknown ROI type code: ${typeCode}`)
    }
  }

  public read(bytes: Uint8Array): Roi {
    if (bytes.length < ROI_HEADER_LENGTH) {
      throw new RoiReadError(`Data too short for a ROI header (${bytes.length} bytes)`)
    }

    const source = new ByteSource(bytes)
    const magic = String.fromCharCode(source.readUint8(), source.readUint8(), source.readUint8())
    if (magic !== ROI_FORMAT_MAGIC) {
      throw new RoiReadError('Not a ROI: bad magic')
    }
    const version = source.readUint8()
    if (version !== ROI_FORMAT_VERSION) {
      throw new RoiReadError(`Unsupported ROI format version: ${version}`)
    }
    const typeCode = source.readUint8()

    try {
      const plane = createPlane({
        z: source.readInt32(),
        t: source.readInt32(),
        c: source.readInt32()
      })
      const roi = this.readPayload(source, typeCode, plane)
      if (source.remaining > 0) {
        throw new RoiReadError(`${source.remaining} unexpected trailing bytes`)
      }
      return roi
    } catch (error) {
      if (error instanceof RoiReadError) throw error
      throw new RoiReadError(
        `Failed to read ROI: ${error instanceof Error ? error.message : 'Unknown error'}`
      )
    }
  }
}

export function deserializeRoi(bytes: Uint8Array): Roi {
  return new RoiReader().read(bytes)
}
