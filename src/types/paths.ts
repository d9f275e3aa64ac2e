import { Point } from './base'

// The subset of path commands needed to describe an area ROI's outline.
export enum PathCommandType {
  MoveTo = 'MoveTo',
  LineTo = 'LineTo',
  CubicTo = 'CubicTo',
  Close = 'Close'
}

export interface MoveToCommand {
  type: PathCommandType.MoveTo
  point: Point
}

export interface LineToCommand {
  type: PathCommandType.LineTo
  point: Point
}

export interface CubicToCommand {
  type: PathCommandType.CubicTo
  control1: Point
  control2: Point
  point: Point
}

export interface CloseCommand {
  type: PathCommandType.Close
}

export type PathCommand = MoveToCommand | LineToCommand | CubicToCommand | CloseCommand

export interface CubicBezier {
  start: Point
  control1: Point
  control2: Point
  end: Point
}
