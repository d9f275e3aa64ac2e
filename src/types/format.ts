// Binary ROI encoding. All multi-byte values are little-endian.
export const ROI_FORMAT_MAGIC = 'ROI'
export const ROI_FORMAT_VERSION = 1

// Magic, version and type code, then z, t and c as 32-bit integers.
export const ROI_HEADER_LENGTH = 3 + 1 + 1 + 3 * 4

export enum RoiTypeCode {
  Rectangle = 1,
  Ellipse = 2,
  Polygon = 3,
  Composite = 4,
  Line = 5,
  Polyline = 6,
  Points = 7
}
