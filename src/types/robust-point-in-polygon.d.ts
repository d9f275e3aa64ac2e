declare module 'robust-point-in-polygon' {
  // -1 inside, 0 on the boundary, 1 outside.
  function robustPointInPolygon(
    polygon: ReadonlyArray<ReadonlyArray<number>>,
    point: ReadonlyArray<number>
  ): -1 | 0 | 1

  export = robustPointInPolygon
}
