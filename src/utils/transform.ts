import { Point } from '../types/base'

export class Matrix {
  // Affine matrix in the usual 2D layout:
  // [a, c, e]
  // [b, d, f]
  // [0, 0, 1]
  constructor(
    public readonly a: number = 1,
    public readonly b: number = 0,
    public readonly c: number = 0,
    public readonly d: number = 1,
    public readonly e: number = 0,
    public readonly f: number = 0
  ) {}

  multiply(other: Matrix): Matrix {
    const a = this.a * other.a + this.c * other.b
    const b = this.b * other.a + this.d * other.b
    const c = this.a * other.c + this.c * other.d
    const d = this.b * other.c + this.d * other.d
    const e = this.a * other.e + this.c * other.f + this.e
    const f = this.b * other.e + this.d * other.f + this.f
    return new Matrix(a, b, c, d, e, f)
  }
}

export class Transform {
  public readonly matrix: Matrix

  constructor(matrix?: Matrix) {
    this.matrix = matrix || new Matrix()
  }

  // Static factory methods.
  static translate(x: number, y: number = 0): Transform {
    return new Transform(new Matrix(1, 0, 0, 1, x, y))
  }

  static scale(x: number, y: number = x): Transform {
    return new Transform(new Matrix(x, 0, 0, y, 0, 0))
  }

  // Instance methods for chaining transformations.
  translate(x: number, y: number = 0): Transform {
    return this.combine(Transform.translate(x, y))
  }

  scale(x: number, y: number = x): Transform {
    return this.combine(Transform.scale(x, y))
  }

  // Combine two transforms; `other` is applied first.
  combine(other: Transform): Transform {
    return new Transform(this.matrix.multiply(other.matrix))
  }

  isIdentity(): boolean {
    const { a, b, c, d, e, f } = this.matrix
    return a === 1 && b === 0 && c === 0 && d === 1 && e === 0 && f === 0
  }

  transformPoint(point: Point): Point {
    const { a, b, c, d, e, f } = this.matrix
    return {
      x: a * point.x + c * point.y + e,
      y: b * point.x + d * point.y + f
    }
  }

  transformPoints(points: readonly Point[]): Point[] {
    if (this.isIdentity()) {
      return points.map((p) => ({ x: p.x, y: p.y }))
    }
    return points.map((p) => this.transformPoint(p))
  }
}
