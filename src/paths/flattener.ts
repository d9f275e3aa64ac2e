import { splitCubicBezier } from '../bezier/split'
import { MAX_FLATTEN_DEPTH } from '../constants'
import { Point } from '../types/base'
import { Ring } from '../types/geometry'
import { CubicBezier, PathCommand, PathCommandType } from '../types/paths'
import { Roi } from '../types/rois'
import { getRoiPath } from '../rois/shape'
import { computePointToPointDistance } from '../utils/geometry'
import { countDistinctPoints, removeConsecutiveDuplicates } from '../utils/polygon'
import { Transform } from '../utils/transform'

function pointToLineDistance(P: Point, A: Point, B: Point): number {
  const vx = B.x - A.x
  const vy = B.y - A.y
  const length = Math.hypot(vx, vy)
  // A closed loop has no chord; measure from its end point instead.
  if (length === 0) {
    return computePointToPointDistance(P, A)
  }
  const wx = P.x - A.x
  const wy = P.y - A.y
  return Math.abs(vx * wy - vy * wx) / length
}

// Appends the curve's vertices after its start point.
function flattenBezier(bezier: CubicBezier, tol: number, depth: number, out: Point[]): void {
  const { start: p0, control1: p1, control2: p2, end: p3 } = bezier
  const d1 = pointToLineDistance(p1, p0, p3)
  const d2 = pointToLineDistance(p2, p0, p3)

  // If both control points lie within tol of the chord, approximate with a single line.
  if (Math.max(d1, d2) <= tol || depth >= MAX_FLATTEN_DEPTH) {
    out.push(p3)
    return
  }

  // Otherwise split at t=0.5 and recurse.
  const { first, second } = splitCubicBezier(bezier, 0.5)
  flattenBezier(first, tol, depth + 1, out)
  flattenBezier(second, tol, depth + 1, out)
}

function transformCommand(command: PathCommand, transform: Transform): PathCommand {
  switch (command.type) {
    case PathCommandType.MoveTo:
    case PathCommandType.LineTo:
      return { type: command.type, point: transform.transformPoint(command.point) }
    case PathCommandType.CubicTo:
      return {
        type: command.type,
        control1: transform.transformPoint(command.control1),
        control2: transform.transformPoint(command.control2),
        point: transform.transformPoint(command.point)
      }
    case PathCommandType.Close:
      return command
  }
}

// Turns a path into closed rings, one per subpath, in subpath order.
// Rings with fewer than three distinct vertices are dropped.
export function flattenPath(commands: readonly PathCommand[], flatness: number): Ring[] {
  const rings: Ring[] = []
  let current: Point[] = []
  let subpathStart: Point | null = null

  const finishRing = (): void => {
    const ring = removeConsecutiveDuplicates(current)
    if (countDistinctPoints(ring) >= 3) {
      rings.push(ring)
    }
    current = []
  }

  for (const command of commands) {
    switch (command.type) {
      case PathCommandType.MoveTo:
        finishRing()
        subpathStart = command.point
        current.push(command.point)
        break
      case PathCommandType.LineTo:
        if (current.length === 0) {
          current.push(subpathStart ?? command.point)
        }
        current.push(command.point)
        break
      case PathCommandType.CubicTo: {
        const start = current.length > 0 ? current[current.length - 1] : subpathStart
        if (start === null) {
          // Nothing to draw from; the curve only establishes a position.
          current.push(command.point)
          subpathStart = command.point
          break
        }
        if (current.length === 0) {
          current.push(start)
        }
        flattenBezier(
          { start, control1: command.control1, control2: command.control2, end: command.point },
          flatness,
          0,
          current
        )
        break
      }
      case PathCommandType.Close:
        finishRing()
        break
    }
  }

  finishRing()
  return rings
}

// Rings of an area ROI, optionally transformed (e.g. to physical units) before flattening.
export function flattenRoi(roi: Roi, flatness: number, transform?: Transform): Ring[] {
  let commands = getRoiPath(roi)
  if (transform && !transform.isIdentity()) {
    commands = commands.map((command) => transformCommand(command, transform))
  }
  return flattenPath(commands, flatness)
}
