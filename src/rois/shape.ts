import { ELLIPSE_CONTROL_FACTOR } from '../constants'
import { Point } from '../types/base'
import { PathCommand, PathCommandType } from '../types/paths'
import { EllipseRoi, Roi, RoiType } from '../types/rois'
import { UnsupportedRoiError } from './factory'

function ringToCommands(ring: readonly Point[]): PathCommand[] {
  if (ring.length === 0) return []

  const commands: PathCommand[] = [{ type: PathCommandType.MoveTo, point: ring[0] }]
  for (let i = 1; i < ring.length; i++) {
    commands.push({ type: PathCommandType.LineTo, point: ring[i] })
  }
  commands.push({ type: PathCommandType.Close })
  return commands
}

// Four cubic quarter arcs, counterclockwise from the rightmost point.
function ellipseToCommands(roi: EllipseRoi): PathCommand[] {
  const rx = roi.width / 2
  const ry = roi.height / 2
  const cx = roi.x + rx
  const cy = roi.y + ry
  const kx = rx * ELLIPSE_CONTROL_FACTOR
  const ky = ry * ELLIPSE_CONTROL_FACTOR

  return [
    { type: PathCommandType.MoveTo, point: { x: cx + rx, y: cy } },
    {
      type: PathCommandType.CubicTo,
      control1: { x: cx + rx, y: cy + ky },
      control2: { x: cx + kx, y: cy + ry },
      point: { x: cx, y: cy + ry }
    },
    {
      type: PathCommandType.CubicTo,
      control1: { x: cx - kx, y: cy + ry },
      control2: { x: cx - rx, y: cy + ky },
      point: { x: cx - rx, y: cy }
    },
    {
      type: PathCommandType.CubicTo,
      control1: { x: cx - rx, y: cy - ky },
      control2: { x: cx - kx, y: cy - ry },
      point: { x: cx, y: cy - ry }
    },
    {
      type: PathCommandType.CubicTo,
      control1: { x: cx + kx, y: cy - ry },
      control2: { x: cx + rx, y: cy - ky },
      point: { x: cx + rx, y: cy }
    },
    { type: PathCommandType.Close }
  ]
}

// Path description of an area ROI. Each composite ring becomes its own subpath, outer ring first.
export function getRoiPath(roi: Roi): PathCommand[] {
  switch (roi.type) {
    case RoiType.Rectangle: {
      const { x, y, width, height } = roi
      return ringToCommands([
        { x, y },
        { x: x + width, y },
        { x: x + width, y: y + height },
        { x, y: y + height }
      ])
    }
    case RoiType.Ellipse:
      return ellipseToCommands(roi)
    case RoiType.Polygon:
      return ringToCommands(roi.points)
    case RoiType.Composite:
      return roi.polygons.flatMap((polygon) => [
        ...ringToCommands(polygon.outer),
        ...polygon.holes.flatMap((hole) => ringToCommands(hole))
      ])
    case RoiType.Line:
    case RoiType.Polyline:
    case RoiType.Points:
      throw new UnsupportedRoiError(`No area path for ROI type: ${roi.type}`)
  }
}
