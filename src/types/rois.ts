import { ImagePlane, Point } from './base'

export enum RoiType {
  Rectangle = 'rectangle',
  Ellipse = 'ellipse',
  Polygon = 'polygon',
  Composite = 'composite',
  Line = 'line',
  Polyline = 'polyline',
  Points = 'points'
}

// What kind of region a ROI describes, independent of its concrete shape.
export enum RoiCategory {
  Area = 'area',
  Line = 'line',
  Point = 'point'
}

interface RoiProperties {
  readonly plane: ImagePlane
}

export interface RectangleRoi extends RoiProperties {
  readonly type: RoiType.Rectangle
  readonly x: number
  readonly y: number
  readonly width: number
  readonly height: number
}

// Parameterised by its bounding box.
export interface EllipseRoi extends RoiProperties {
  readonly type: RoiType.Ellipse
  readonly x: number
  readonly y: number
  readonly width: number
  readonly height: number
}

export interface PolygonRoi extends RoiProperties {
  readonly type: RoiType.Polygon
  readonly points: readonly Point[]
}

export interface CompositePolygon {
  readonly outer: readonly Point[] // Positive signed area.
  readonly holes: readonly (readonly Point[])[] // Negative signed area.
}

// Arbitrary unions and differences; only produced by the converter and combination code.
export interface CompositeRoi extends RoiProperties {
  readonly type: RoiType.Composite
  readonly polygons: readonly CompositePolygon[]
}

export interface LineRoi extends RoiProperties {
  readonly type: RoiType.Line
  readonly x1: number
  readonly y1: number
  readonly x2: number
  readonly y2: number
}

export interface PolylineRoi extends RoiProperties {
  readonly type: RoiType.Polyline
  readonly points: readonly Point[]
}

export interface PointsRoi extends RoiProperties {
  readonly type: RoiType.Points
  readonly points: readonly Point[]
}

export type AreaRoi = RectangleRoi | EllipseRoi | PolygonRoi | CompositeRoi

export type LinearRoi = LineRoi | PolylineRoi

// Union type after all ROIs are defined.
export type Roi = AreaRoi | LinearRoi | PointsRoi
