export enum PrecisionModelType {
  Floating = 'floating',
  Fixed = 'fixed'
}

export type PrecisionModel =
  | { type: PrecisionModelType.Floating }
  // Coordinates are rounded to the nearest multiple of 1 / scale.
  | { type: PrecisionModelType.Fixed; scale: number }

// Where repair diagnostics are reported. The global console satisfies this.
export interface DiagnosticLogger {
  debug(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
}

// Options that control conversion between ROIs and geometry.
export type ConverterOptions = {
  pixelWidth?: number
  pixelHeight?: number
  flatness?: number
  precisionModel?: PrecisionModel
  logger?: DiagnosticLogger
}

export type ConverterConfig = Readonly<Required<ConverterOptions>>
