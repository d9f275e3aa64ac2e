import { describe, expect, it } from '@jest/globals'
import { compareRois } from '../src/rois/comparator'
import {
  createEllipseRoi,
  createPlane,
  createPolygonRoi,
  createRectangleRoi
} from '../src/rois/factory'
import { getRoiBounds } from '../src/rois/measure'

describe('ROI comparator', () => {
  it('should order by bounds first', () => {
    const a = createRectangleRoi(0, 0, 10, 10)
    const b = createRectangleRoi(1, 0, 10, 10)
    expect(compareRois(a, b)).toBe(-1)
    expect(compareRois(b, a)).toBe(1)
    const short = createRectangleRoi(0, 0, 10, 5)
    expect(compareRois(short, a)).toBe(-1)
  })

  it('should treat equal shapes as equal', () => {
    const a = createRectangleRoi(0, 0, 10, 10)
    const b = createRectangleRoi(0, 0, 10, 10)
    expect(compareRois(a, b)).toBe(0)
  })

  it('should order by plane when bounds match', () => {
    const a = createRectangleRoi(0, 0, 10, 10, createPlane({ z: 1 }))
    const b = createRectangleRoi(0, 0, 10, 10, createPlane({ z: 0, t: 5 }))
    expect(compareRois(a, b)).toBe(1)
    expect(compareRois(b, a)).toBe(-1)
  })

  it('should order by vertices when bounds and plane match', () => {
    const a = createPolygonRoi([
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 0, y: 10 }
    ])
    const b = createPolygonRoi([
      { x: 0, y: 0 },
      { x: 0, y: 10 },
      { x: 10, y: 0 }
    ])
    expect(compareRois(a, b)).toBe(1)
  })

  it('should order by point count last', () => {
    const triangle = createPolygonRoi([
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 }
    ])
    const square = createPolygonRoi([
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 },
      { x: 0, y: 10 }
    ])
    expect(compareRois(triangle, square)).toBe(-1)
  })

  it('should sort a list', () => {
    const rois = [
      createEllipseRoi(20, 0, 5, 5),
      createRectangleRoi(0, 0, 5, 5),
      createRectangleRoi(10, 0, 5, 5)
    ]
    const sorted = [...rois].sort(compareRois)
    expect(sorted.map((roi) => getRoiBounds(roi).x)).toEqual([0, 10, 20])
  })
})
