import { describe, expect, it, jest } from '@jest/globals'
import {
  CombineOp,
  PlaneMismatchError,
  combine,
  combineRois,
  unionRois
} from '../src/combine/combine'
import { RoiConverter } from '../src/converter/converter'
import {
  UnsupportedRoiError,
  createEllipseRoi,
  createEmptyRoi,
  createLineRoi,
  createPlane,
  createPolygonRoi,
  createRectangleRoi
} from '../src/rois/factory'
import { getPolygonPoints, getRoiArea, getRoiBounds, isRoiEmpty } from '../src/rois/measure'
import { getGeometryArea, isGeometryValid } from '../src/topology/geometry'
import { RepairQuality } from '../src/types/geometry'
import { PrecisionModelType } from '../src/types/options'
import { RoiType } from '../src/types/rois'

const converter = new RoiConverter({ logger: { debug: jest.fn(), warn: jest.fn() } })

const left = createRectangleRoi(0, 0, 10, 10)
const right = createRectangleRoi(5, 0, 10, 10)

describe('Boolean combination', () => {
  it('should compute union, intersection, difference and symmetric difference', () => {
    expect(getRoiArea(combineRois(left, right, CombineOp.Union, converter))).toBeCloseTo(150, 10)
    expect(getRoiArea(combineRois(left, right, CombineOp.Intersection, converter))).toBeCloseTo(
      50,
      10
    )
    expect(getRoiArea(combineRois(left, right, CombineOp.Difference, converter))).toBeCloseTo(
      50,
      10
    )
    expect(
      getRoiArea(combineRois(left, right, CombineOp.SymmetricDifference, converter))
    ).toBeCloseTo(100, 10)
  })

  it('should merge overlapping rectangles into one polygon', () => {
    const roi = combineRois(left, right, CombineOp.Union, converter)
    expect(roi.type).toBe(RoiType.Polygon)
    expect(getRoiBounds(roi)).toEqual({ x: 0, y: 0, width: 15, height: 10 })
  })

  it('should keep disjoint pieces in a composite', () => {
    const far = createRectangleRoi(20, 0, 10, 10)
    const roi = combineRois(left, far, CombineOp.Union, converter)
    expect(roi.type).toBe(RoiType.Composite)
    expect(roi.type === RoiType.Composite && roi.polygons.length).toBe(2)
  })

  it('should return the empty ROI for a disjoint intersection', () => {
    const far = createRectangleRoi(20, 0, 10, 10)
    const roi = combineRois(left, far, CombineOp.Intersection, converter)
    expect(roi).toEqual(createEmptyRoi())
  })

  it('should subtract an ellipse from a rectangle', () => {
    const rectangle = createRectangleRoi(0, 0, 1000, 1000)
    const ellipse = createEllipseRoi(50, 50, 500, 300)
    const expected =
      getRoiArea(rectangle) - getGeometryArea(converter.roiToGeometry(ellipse).geometry)

    const roi = combineRois(rectangle, ellipse, CombineOp.Difference, converter)
    const { geometry } = converter.roiToGeometry(roi)

    expect(roi.type).toBe(RoiType.Composite)
    expect(getRoiArea(roi)).toBeCloseTo(expected, 1)
    expect(isGeometryValid(geometry)).toBe(true)
  })

  it('should keep the plane of the inputs', () => {
    const plane = createPlane({ z: 2, t: 1 })
    const roi = combineRois(
      createRectangleRoi(0, 0, 10, 10, plane),
      createRectangleRoi(5, 5, 10, 10, plane),
      CombineOp.Union,
      converter
    )
    expect(roi.plane).toEqual(plane)
  })

  it('should round clipped vertices to a fixed precision model', () => {
    const fixed = new RoiConverter({
      precisionModel: { type: PrecisionModelType.Fixed, scale: 1 },
      logger: { debug: jest.fn(), warn: jest.fn() }
    })
    const roi = combineRois(
      createRectangleRoi(0, 0, 100, 100),
      createEllipseRoi(30, 30, 100, 100),
      CombineOp.Intersection,
      fixed
    )
    const points = getPolygonPoints(roi)

    expect(getRoiArea(roi)).toBeGreaterThan(0)
    expect(points.every((p) => Number.isInteger(p.x) && Number.isInteger(p.y))).toBe(true)
  })

  it('should return repair diagnostics for invalid inputs', () => {
    const bowtie = createPolygonRoi([
      { x: 0, y: 0 },
      { x: 6, y: 6 },
      { x: 6, y: 0 },
      { x: 0, y: 2 }
    ])
    const { diagnostics } = combine(bowtie, left, CombineOp.Union, converter)
    expect(diagnostics.map((d) => d.quality)).toEqual([RepairQuality.Approximate])
  })
})

describe('Combination with empty ROIs', () => {
  const empty = createEmptyRoi()

  it('should follow set algebra', () => {
    expect(combineRois(empty, left, CombineOp.Union, converter)).toBe(left)
    expect(combineRois(left, empty, CombineOp.Union, converter)).toBe(left)
    expect(combineRois(left, empty, CombineOp.Difference, converter)).toBe(left)
    expect(isRoiEmpty(combineRois(empty, left, CombineOp.Difference, converter))).toBe(true)
    expect(isRoiEmpty(combineRois(empty, left, CombineOp.Intersection, converter))).toBe(true)
    expect(combineRois(empty, left, CombineOp.SymmetricDifference, converter)).toBe(left)
  })

  it('should treat a zero-size rectangle as empty', () => {
    const flat = createRectangleRoi(0, 0, 0, 10)
    expect(combineRois(left, flat, CombineOp.Union, converter)).toBe(left)
  })
})

describe('Combination errors', () => {
  it('should refuse ROIs on different planes', () => {
    const other = createRectangleRoi(0, 0, 10, 10, createPlane({ z: 1 }))
    expect(() => combineRois(left, other, CombineOp.Union, converter)).toThrow(PlaneMismatchError)
  })

  it('should check planes before anything else', () => {
    const line = createLineRoi(0, 0, 1, 1, createPlane({ t: 5 }))
    expect(() => combineRois(left, line, CombineOp.Union, converter)).toThrow(PlaneMismatchError)
  })

  it('should refuse line ROIs', () => {
    const line = createLineRoi(0, 0, 1, 1)
    expect(() => combineRois(left, line, CombineOp.Union, converter)).toThrow(UnsupportedRoiError)
  })
})

describe('Union of many ROIs', () => {
  it('should union a list of rectangles', () => {
    const roi = unionRois(
      [left, right, createRectangleRoi(15, 0, 5, 10), createEmptyRoi()],
      converter
    )
    expect(getRoiArea(roi)).toBeCloseTo(200, 10)
    expect(getRoiBounds(roi)).toEqual({ x: 0, y: 0, width: 20, height: 10 })
  })

  it('should return a single ROI as is', () => {
    expect(unionRois([left], converter)).toBe(left)
  })

  it('should refuse an empty list', () => {
    expect(() => unionRois([], converter)).toThrow(UnsupportedRoiError)
  })
})
