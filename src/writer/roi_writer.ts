import { Point } from '../types/base'
import { ROI_FORMAT_MAGIC, ROI_FORMAT_VERSION, RoiTypeCode } from '../types/format'
import { Roi, RoiType } from '../types/rois'

export class RoiWriteError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'RoiWriteError'
  }
}

const UINT32_MAX = 0xffffffff

function getTypeCode(roi: Roi): RoiTypeCode {
  switch (roi.type) {
    case RoiType.Rectangle:
      return RoiTypeCode.Rectangle
    case RoiType.Ellipse:
      return RoiTypeCode.Ellipse
    case RoiType.Polygon:
      return RoiTypeCode.Polygon
    case RoiType.Composite:
      return RoiTypeCode.Composite
    case RoiType.Line:
      return RoiTypeCode.Line
    case RoiType.Polyline:
      return RoiTypeCode.Polyline
    case RoiType.Points:
      return RoiTypeCode.Points
    default:
      throw new RoiWriteError(`Unsupported ROI type: ${JSON.stringify(roi)}`)
  }
}

// Appends fields to a growing little-endian buffer.
class ByteSink {
  private buffer = new ArrayBuffer(256)
  private view = new DataView(this.buffer)
  private offset = 0

  private reserve(length: number): void {
    if (this.offset + length <= this.buffer.byteLength) return
    let size = this.buffer.byteLength * 2
    while (size < this.offset + length) size *= 2
    const next = new ArrayBuffer(size)
    new Uint8Array(next).set(new Uint8Array(this.buffer, 0, this.offset))
    this.buffer = next
    this.view = new DataView(next)
  }

  writeUint8(value: number): void {
    this.reserve(1)
    this.view.setUint8(this.offset, value)
    this.offset += 1
  }

  writeInt32(value: number): void {
    if (!Number.isInteger(value) || value < -0x80000000 || value > 0x7fffffff) {
      throw new RoiWriteError(`Value does not fit a 32-bit integer: ${value}`)
    }
    this.reserve(4)
    this.view.setInt32(this.offset, value, true)
    this.offset += 4
  }

  writeUint32(value: number): void {
    if (value > UINT32_MAX) {
      throw new RoiWriteError(`Count does not fit a 32-bit integer: ${value}`)
    }
    this.reserve(4)
    this.view.setUint32(this.offset, value, true)
    this.offset += 4
  }

  writeFloat64(value: number): void {
    this.reserve(8)
    this.view.setFloat64(this.offset, value, true)
    this.offset += 8
  }

  toBytes(): Uint8Array {
    return new Uint8Array(this.buffer.slice(0, this.offset))
  }
}

export class RoiWriter {
  private writePoints(sink: ByteSink, points: readonly Point[]): void {
    sink.writeUint32(points.length)
    for (const point of points) {
      sink.writeFloat64(point.x)
      sink.writeFloat64(point.y)
    }
  }

  private writePayload(sink: ByteSink, roi: Roi): void {
    switch (roi.type) {
      case RoiType.Rectangle:
      case RoiType.Ellipse:
        sink.writeFloat64(roi.x)
        sink.writeFloat64(roi.y)
        sink.writeFloat64(roi.width)
        sink.writeFloat64(roi.height)
        break
      case RoiType.Line:
        sink.writeFloat64(roi.x1)
        sink.writeFloat64(roi.y1)
        sink.writeFloat64(roi.x2)
        sink.writeFloat64(roi.y2)
        break
      case RoiType.Polygon:
      case RoiType.Polyline:
      case RoiType.Points:
        this.writePoints(sink, roi.points)
        break
      case RoiType.Composite:
        sink.writeUint32(roi.polygons.length)
        for (const polygon of roi.polygons) {
          sink.writeUint32(1 + polygon.holes.length)
          this.writePoints(sink, polygon.outer)
          for (const hole of polygon.holes) {
            this.writePoints(sink, hole)
          }
        }
        break
    }
  }

  public write(roi: Roi): Uint8Array {
    const sink = new ByteSink()
    for (let i = 0; i < ROI_FORMAT_MAGIC.length; i++) {
      sink.writeUint8(ROI_FORMAT_MAGIC.charCodeAt(i))
    }
    sink.writeUint8(ROI_FORMAT_VERSION)
    sink.writeUint8(getTypeCode(roi))
    sink.writeInt32(roi.plane.z)
    sink.writeInt32(roi.plane.t)
    sink.writeInt32(roi.plane.c)
    this.writePayload(sink, roi)
    return sink.toBytes()
  }
}

export function serializeRoi(roi: Roi): Uint8Array {
  return new RoiWriter().write(roi)
}
