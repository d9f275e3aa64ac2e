import { ImagePlane } from '../types/base'

// Channel -1 means the ROI applies to all channels.
export const DEFAULT_PLANE: ImagePlane = Object.freeze({ z: 0, t: 0, c: -1 })

export function planesEqual(a: ImagePlane, b: ImagePlane): boolean {
  return a.z === b.z && a.t === b.t && a.c === b.c
}

export function formatPlane(plane: ImagePlane): string {
  return `z=${plane.z}, t=${plane.t}, c=${plane.c}`
}
