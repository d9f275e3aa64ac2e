import { Point } from '../types/base'
import { CubicBezier } from '../types/paths'

export interface SplitBezierResult {
  first: CubicBezier // Curve over [0, t].
  second: CubicBezier // Curve over [t, 1].
  splitPoint: Point
}

function lerp(p0: Point, p1: Point, t: number): Point {
  return {
    x: p0.x + t * (p1.x - p0.x),
    y: p0.y + t * (p1.y - p0.y)
  }
}

export function splitCubicBezier(bezier: CubicBezier, t: number): SplitBezierResult {
  // De Casteljau.
  const { start, control1, control2, end } = bezier
  const p01 = lerp(start, control1, t)
  const p11 = lerp(control1, control2, t)
  const p21 = lerp(control2, end, t)
  const p02 = lerp(p01, p11, t)
  const p12 = lerp(p11, p21, t)
  const splitPoint = lerp(p02, p12, t)

  return {
    first: { start, control1: p01, control2: p02, end: splitPoint },
    second: { start: splitPoint, control1: p12, control2: p21, end },
    splitPoint
  }
}
