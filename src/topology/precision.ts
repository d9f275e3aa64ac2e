import { Point } from '../types/base'
import { PolygonWithHoles } from '../types/geometry'
import { PrecisionModel, PrecisionModelType } from '../types/options'

export const FLOATING_PRECISION: PrecisionModel = Object.freeze<PrecisionModel>({
  type: PrecisionModelType.Floating
})

export function makePrecise(value: number, model: PrecisionModel): number {
  if (model.type === PrecisionModelType.Fixed) {
    return Math.round(value * model.scale) / model.scale
  }
  return value
}

export function makePrecisePoints(points: readonly Point[], model: PrecisionModel): Point[] {
  if (model.type === PrecisionModelType.Floating) {
    return [...points]
  }
  return points.map((p) => ({ x: makePrecise(p.x, model), y: makePrecise(p.y, model) }))
}

// Snaps clipping output onto the model's grid. Rounding can fold rings, so callers simplify after.
export function makePrecisePolygons(
  polygons: readonly PolygonWithHoles[],
  model: PrecisionModel
): PolygonWithHoles[] {
  if (model.type === PrecisionModelType.Floating) {
    return [...polygons]
  }
  return polygons.map((polygon) => ({
    outer: makePrecisePoints(polygon.outer, model),
    holes: polygon.holes.map((hole) => makePrecisePoints(hole, model))
  }))
}
