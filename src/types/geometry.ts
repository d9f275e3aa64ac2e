import { Point } from './base'

export enum GeometryType {
  Empty = 'Empty',
  Point = 'Point',
  MultiPoint = 'MultiPoint',
  LineString = 'LineString',
  MultiPolygon = 'MultiPolygon'
}

// A closed loop of vertices. The closing vertex is implicit and never repeated.
export type Ring = readonly Point[]

export interface PolygonWithHoles {
  readonly outer: Ring
  readonly holes: readonly Ring[]
}

// How much a geometry had to be altered to make it valid.
export enum RepairQuality {
  None = 'none',
  Safe = 'safe',
  Approximate = 'approximate'
}

export interface EmptyGeometry {
  readonly type: GeometryType.Empty
}

export interface PointGeometry {
  readonly type: GeometryType.Point
  readonly point: Point
}

export interface MultiPointGeometry {
  readonly type: GeometryType.MultiPoint
  readonly points: readonly Point[]
}

export interface LineStringGeometry {
  readonly type: GeometryType.LineString
  readonly points: readonly Point[]
}

// Never holds zero polygons; that case is always the empty geometry.
export interface MultiPolygonGeometry {
  readonly type: GeometryType.MultiPolygon
  readonly polygons: readonly PolygonWithHoles[]
  readonly quality: RepairQuality
}

export type TopologyGeometry =
  | EmptyGeometry
  | PointGeometry
  | MultiPointGeometry
  | LineStringGeometry
  | MultiPolygonGeometry

export interface RepairDiagnostic {
  ringIndex: number // Index of the ring in the builder's input.
  quality: RepairQuality.Safe | RepairQuality.Approximate
  location: Point // Where the self-intersection was found.
  areaBefore: number
  areaAfter: number
  snapTolerance: number
}

export interface ConversionResult {
  geometry: TopologyGeometry
  diagnostics: RepairDiagnostic[]
}
