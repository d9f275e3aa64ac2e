import { describe, expect, it } from '@jest/globals'
import {
  RoiCreationError,
  UnsupportedRoiError,
  createCompositeRoi,
  createEllipseRoi,
  createEmptyRoi,
  createLineRoi,
  createPlane,
  createPointsRoi,
  createPolygonRoi,
  createPolylineRoi,
  createRectangleRoi,
  getRoiCategory
} from '../src/rois/factory'
import {
  getPolygonPoints,
  getRoiArea,
  getRoiBounds,
  getRoiCentroid,
  getRoiLength,
  getRoiNumPoints,
  isRoiEmpty,
  roiContainsPoint
} from '../src/rois/measure'
import { DEFAULT_PLANE, planesEqual } from '../src/rois/planes'
import { getRoiPath } from '../src/rois/shape'
import { scaleRoi, translateRoi, updateRoiPlane } from '../src/rois/transform_roi'
import { PathCommandType } from '../src/types/paths'
import { RoiCategory, RoiType } from '../src/types/rois'
import { calculatePolygonArea } from '../src/utils/geometry'

describe('ROI creation', () => {
  it('should normalise negative rectangle sizes', () => {
    const roi = createRectangleRoi(10, 20, -5, 8)
    expect(roi).toMatchObject({ x: 5, y: 20, width: 5, height: 8 })
  })

  it('should reject non-finite coordinates', () => {
    expect(() => createRectangleRoi(0, 0, NaN, 10)).toThrow(RoiCreationError)
    expect(() => createPolygonRoi([{ x: 0, y: Infinity }])).toThrow(RoiCreationError)
  })

  it('should reject fractional plane indices', () => {
    expect(() => createPlane({ z: 1.5 })).toThrow(RoiCreationError)
  })

  it('should use the default plane', () => {
    const roi = createEllipseRoi(0, 0, 10, 10)
    expect(planesEqual(roi.plane, DEFAULT_PLANE)).toBe(true)
    expect(roi.plane.c).toBe(-1)
  })

  it('should freeze ROIs deeply', () => {
    const roi = createPolygonRoi([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 1, y: 1 }
    ])
    expect(Object.isFrozen(roi)).toBe(true)
    expect(Object.isFrozen(roi.points)).toBe(true)
    expect(Object.isFrozen(roi.points[0])).toBe(true)
    expect(Object.isFrozen(roi.plane)).toBe(true)
  })

  it('should orient composite rings', () => {
    const roi = createCompositeRoi([
      {
        // Clockwise outer ring and counterclockwise hole.
        outer: [
          { x: 0, y: 0 },
          { x: 0, y: 10 },
          { x: 10, y: 10 },
          { x: 10, y: 0 }
        ],
        holes: [
          [
            { x: 4, y: 4 },
            { x: 6, y: 4 },
            { x: 6, y: 6 },
            { x: 4, y: 6 }
          ]
        ]
      }
    ])
    expect(calculatePolygonArea(roi.polygons[0].outer)).toBe(100)
    expect(calculatePolygonArea(roi.polygons[0].holes[0])).toBe(-4)
    expect(getRoiArea(roi)).toBe(96)
  })

  it('should categorise ROIs', () => {
    expect(getRoiCategory(createRectangleRoi(0, 0, 1, 1))).toBe(RoiCategory.Area)
    expect(getRoiCategory(createLineRoi(0, 0, 1, 1))).toBe(RoiCategory.Line)
    expect(getRoiCategory(createPolylineRoi([]))).toBe(RoiCategory.Line)
    expect(getRoiCategory(createPointsRoi([]))).toBe(RoiCategory.Point)
  })
})

describe('ROI measurements', () => {
  it('should compute exact areas of primitive shapes', () => {
    expect(getRoiArea(createRectangleRoi(0, 0, 1000, 1000))).toBe(1e6)
    expect(getRoiArea(createEllipseRoi(0, 0, 500, 300))).toBeCloseTo(117809.7245, 3)
    expect(getRoiArea(createLineRoi(0, 0, 10, 10))).toBe(0)
  })

  it('should compute bounds from parameters and vertices', () => {
    expect(getRoiBounds(createEllipseRoi(5, 6, 7, 8))).toEqual({ x: 5, y: 6, width: 7, height: 8 })
    expect(getRoiBounds(createLineRoi(10, 0, 0, 5))).toEqual({ x: 0, y: 0, width: 10, height: 5 })
    expect(getRoiBounds(createEmptyRoi())).toEqual({ x: 0, y: 0, width: 0, height: 0 })
  })

  it('should compute lengths and perimeters', () => {
    expect(getRoiLength(createLineRoi(0, 0, 3, 4))).toBe(5)
    expect(getRoiLength(createRectangleRoi(0, 0, 10, 5))).toBe(30)
    expect(getRoiLength(createEllipseRoi(0, 0, 10, 10))).toBeCloseTo(10 * Math.PI, 10)
  })

  it('should compute centroids', () => {
    expect(getRoiCentroid(createRectangleRoi(0, 0, 10, 20))).toEqual({ x: 5, y: 10 })
    expect(
      getRoiCentroid(
        createPointsRoi([
          { x: 0, y: 0 },
          { x: 4, y: 2 }
        ])
      )
    ).toEqual({ x: 2, y: 1 })
    const empty = getRoiCentroid(createPointsRoi([]))
    expect(Number.isNaN(empty.x)).toBe(true)
  })

  it('should test containment', () => {
    const ellipse = createEllipseRoi(0, 0, 20, 10)
    expect(roiContainsPoint(ellipse, { x: 10, y: 5 })).toBe(true)
    expect(roiContainsPoint(ellipse, { x: 1, y: 1 })).toBe(false)

    const triangle = createPolygonRoi([
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 0, y: 10 }
    ])
    expect(roiContainsPoint(triangle, { x: 2, y: 2 })).toBe(true)
    expect(roiContainsPoint(triangle, { x: 5, y: 0 })).toBe(true)
    expect(roiContainsPoint(triangle, { x: 8, y: 8 })).toBe(false)
    expect(roiContainsPoint(createLineRoi(0, 0, 10, 10), { x: 5, y: 5 })).toBe(false)
  })

  it('should list vertices', () => {
    expect(getPolygonPoints(createRectangleRoi(1, 2, 3, 4))).toEqual([
      { x: 1, y: 2 },
      { x: 4, y: 2 },
      { x: 4, y: 6 },
      { x: 1, y: 6 }
    ])
    expect(getRoiNumPoints(createLineRoi(0, 0, 1, 1))).toBe(2)
    expect(getRoiNumPoints(createEllipseRoi(0, 0, 100, 100))).toBeGreaterThan(4)
  })

  it('should recognise empty ROIs', () => {
    expect(isRoiEmpty(createEmptyRoi())).toBe(true)
    expect(isRoiEmpty(createRectangleRoi(0, 0, 0, 10))).toBe(true)
    expect(isRoiEmpty(createLineRoi(3, 3, 3, 3))).toBe(true)
    expect(isRoiEmpty(createPointsRoi([]))).toBe(true)
    expect(isRoiEmpty(createPointsRoi([{ x: 0, y: 0 }]))).toBe(false)
    expect(isRoiEmpty(createRectangleRoi(0, 0, 1, 1))).toBe(false)
  })
})

describe('ROI paths', () => {
  it('should describe a rectangle counterclockwise', () => {
    const commands = getRoiPath(createRectangleRoi(0, 0, 10, 5))
    expect(commands.map((command) => command.type)).toEqual([
      PathCommandType.MoveTo,
      PathCommandType.LineTo,
      PathCommandType.LineTo,
      PathCommandType.LineTo,
      PathCommandType.Close
    ])
  })

  it('should describe an ellipse with four curves', () => {
    const commands = getRoiPath(createEllipseRoi(0, 0, 20, 10))
    expect(commands[0]).toEqual({ type: PathCommandType.MoveTo, point: { x: 20, y: 5 } })
    expect(commands.filter((c) => c.type === PathCommandType.CubicTo)).toHaveLength(4)
  })

  it('should refuse line ROIs', () => {
    expect(() => getRoiPath(createLineRoi(0, 0, 1, 1))).toThrow(UnsupportedRoiError)
  })
})

describe('ROI transforms', () => {
  it('should translate a rectangle', () => {
    const roi = translateRoi(createRectangleRoi(0, 0, 10, 10), 5, -5)
    expect(roi).toMatchObject({ type: RoiType.Rectangle, x: 5, y: -5, width: 10, height: 10 })
  })

  it('should mirror a rectangle under a negative scale', () => {
    const roi = scaleRoi(createRectangleRoi(0, 0, 10, 5), -1)
    expect(getRoiBounds(roi)).toEqual({ x: -10, y: -5, width: 10, height: 5 })
  })

  it('should scale about an origin', () => {
    const roi = scaleRoi(createLineRoi(10, 10, 20, 10), 2, 2, { x: 10, y: 10 })
    expect(roi).toMatchObject({ x1: 10, y1: 10, x2: 30, y2: 10 })
  })

  it('should move a ROI to another plane', () => {
    const plane = createPlane({ z: 3, t: 1, c: 0 })
    const roi = updateRoiPlane(createPointsRoi([{ x: 1, y: 2 }]), plane)
    expect(roi.plane).toEqual({ z: 3, t: 1, c: 0 })
    expect(getPolygonPoints(roi)).toEqual([{ x: 1, y: 2 }])
  })
})
