import Genome from './genome';
import { InvalidGenomeLengthError } from '../errors';

/**
 * Phenotype decoding: the bit layout of a vehicle genome and the pure
 * function that turns a genome into the parameters the simulation harness
 * builds a car from.
 *
 * The body is a convex polygon whose vertices sit at equal angular steps
 * around the centre; each vertex is described by its distance from the
 * centre. Wheels hang off body vertices and are driven by a motor whose
 * torque and speed are shared by all wheels.
 */

/** Numeric range a decoded field is mapped into. */
export interface FieldRange {
  readonly min: number;
  readonly max: number;
}

/** Decoded vehicle parameters handed to the simulation harness. */
export interface VehicleDefinition {
  /** Distance of each body vertex from the body centre. */
  readonly bodyPoints: readonly number[];
  /** Density of the body polygon. */
  readonly bodyDensity: number;
  /** Index of the body vertex each wheel is attached to. */
  readonly wheelAttachments: readonly number[];
  readonly wheelRadii: readonly number[];
  readonly wheelDensities: readonly number[];
  /** Maximum motor torque applied to every wheel. */
  readonly wheelTorque: number;
  /** Motor speed in degrees per second. */
  readonly wheelSpeed: number;
}

/** Structural limits and numeric ranges of the vehicle schema. */
export const VEHICLE_LIMITS = {
  numBodyPoints: 8,
  numWheels: 2,
  bodyPointDistance: { min: 0.1, max: 3 },
  bodyDensity: { min: 30, max: 300 },
  wheelRadius: { min: 0.2, max: 1.5 },
  wheelDensity: { min: 40, max: 100 },
  wheelTorque: { min: 0, max: 400 },
  wheelSpeed: { min: 90, max: 1080 },
} as const;

/** Shape applied to the normalized raw value before scaling into the range. */
export type FieldCurve = 'linear' | 'sqrt';

/** Which vehicle parameter a genome field encodes. */
export type FieldKind =
  | 'bodyPoint'
  | 'bodyDensity'
  | 'wheelAttachment'
  | 'wheelRadius'
  | 'wheelDensity'
  | 'wheelTorque'
  | 'wheelSpeed';

/** One contiguous bit field of the genome. */
export interface GenomeField {
  readonly kind: FieldKind;
  /** Body vertex or wheel index for per-element fields, 0 for scalars. */
  readonly index: number;
  readonly offset: number;
  readonly width: number;
  readonly curve: FieldCurve;
}

/** Bits per continuous field. */
const VALUE_BITS = 8;

/** Bits needed to address every body vertex. */
const ATTACHMENT_BITS = Math.max(
  1,
  Math.ceil(Math.log2(VEHICLE_LIMITS.numBodyPoints))
);

/**
 * The genome layout, in bit order. Field boundaries never change within a
 * run, so the layout is computed once at module load.
 */
export const GENOME_LAYOUT: readonly GenomeField[] = buildLayout();

/** Total genome length in bits. */
export const GENOME_LENGTH: number = GENOME_LAYOUT.reduce(
  (sum, field) => sum + field.width,
  0
);

function buildLayout(): GenomeField[] {
  const fields: GenomeField[] = [];
  let offset = 0;
  const push = (
    kind: FieldKind,
    index: number,
    width: number,
    curve: FieldCurve = 'linear'
  ) => {
    fields.push({ kind, index, offset, width, curve });
    offset += width;
  };
  for (let i = 0; i < VEHICLE_LIMITS.numBodyPoints; i++) push('bodyPoint', i, VALUE_BITS);
  push('bodyDensity', 0, VALUE_BITS);
  for (let w = 0; w < VEHICLE_LIMITS.numWheels; w++) {
    push('wheelAttachment', w, ATTACHMENT_BITS);
    push('wheelRadius', w, VALUE_BITS);
    push('wheelDensity', w, VALUE_BITS, 'sqrt');
  }
  push('wheelTorque', 0, VALUE_BITS);
  push('wheelSpeed', 0, VALUE_BITS);
  return fields;
}

/** Clamp `value` into `[range.min, range.max]`. */
export function clamp(value: number, range: FieldRange): number {
  return Math.min(range.max, Math.max(range.min, value));
}

/**
 * Map a raw unsigned field value into `range` through `curve`, re-clamping
 * whatever floating point rounding pushed outside the range.
 */
export function scaleField(
  raw: number,
  width: number,
  range: FieldRange,
  curve: FieldCurve
): number {
  const maxRaw = 2 ** width - 1;
  const fraction = maxRaw > 0 ? raw / maxRaw : 0;
  const shaped = curve === 'sqrt' ? Math.sqrt(fraction) : fraction;
  return clamp(range.min + shaped * (range.max - range.min), range);
}

/**
 * Decode a genome into a vehicle definition.
 *
 * Total for every genome of {@link GENOME_LENGTH} bits: continuous fields are
 * scaled and clamped, attachment indexes wrap modulo the vertex count.
 *
 * @throws {InvalidGenomeLengthError} when the genome length does not match the schema.
 */
export function decode(genome: Genome): VehicleDefinition {
  if (genome.length !== GENOME_LENGTH) {
    throw new InvalidGenomeLengthError(GENOME_LENGTH, genome.length);
  }
  const bodyPoints: number[] = [];
  const wheelAttachments: number[] = [];
  const wheelRadii: number[] = [];
  const wheelDensities: number[] = [];
  let bodyDensity: number = VEHICLE_LIMITS.bodyDensity.min;
  let wheelTorque: number = VEHICLE_LIMITS.wheelTorque.min;
  let wheelSpeed: number = VEHICLE_LIMITS.wheelSpeed.min;

  for (const field of GENOME_LAYOUT) {
    const raw = genome.readUint(field.offset, field.width);
    switch (field.kind) {
      case 'bodyPoint':
        bodyPoints[field.index] = scaleField(
          raw,
          field.width,
          VEHICLE_LIMITS.bodyPointDistance,
          field.curve
        );
        break;
      case 'bodyDensity':
        bodyDensity = scaleField(raw, field.width, VEHICLE_LIMITS.bodyDensity, field.curve);
        break;
      case 'wheelAttachment':
        wheelAttachments[field.index] = raw % VEHICLE_LIMITS.numBodyPoints;
        break;
      case 'wheelRadius':
        wheelRadii[field.index] = scaleField(
          raw,
          field.width,
          VEHICLE_LIMITS.wheelRadius,
          field.curve
        );
        break;
      case 'wheelDensity':
        wheelDensities[field.index] = scaleField(
          raw,
          field.width,
          VEHICLE_LIMITS.wheelDensity,
          field.curve
        );
        break;
      case 'wheelTorque':
        wheelTorque = scaleField(raw, field.width, VEHICLE_LIMITS.wheelTorque, field.curve);
        break;
      case 'wheelSpeed':
        wheelSpeed = scaleField(raw, field.width, VEHICLE_LIMITS.wheelSpeed, field.curve);
        break;
    }
  }

  return {
    bodyPoints,
    bodyDensity,
    wheelAttachments,
    wheelRadii,
    wheelDensities,
    wheelTorque,
    wheelSpeed,
  };
}

/** True when every field of `def` lies inside its declared range and shape. */
export function isVehicleInRange(def: VehicleDefinition): boolean {
  const within = (v: number, r: FieldRange) =>
    Number.isFinite(v) && v >= r.min && v <= r.max;
  return (
    def.bodyPoints.length === VEHICLE_LIMITS.numBodyPoints &&
    def.bodyPoints.every((d) => within(d, VEHICLE_LIMITS.bodyPointDistance)) &&
    within(def.bodyDensity, VEHICLE_LIMITS.bodyDensity) &&
    def.wheelAttachments.length === VEHICLE_LIMITS.numWheels &&
    def.wheelAttachments.every(
      (a) => Number.isInteger(a) && a >= 0 && a < VEHICLE_LIMITS.numBodyPoints
    ) &&
    def.wheelRadii.length === VEHICLE_LIMITS.numWheels &&
    def.wheelRadii.every((r) => within(r, VEHICLE_LIMITS.wheelRadius)) &&
    def.wheelDensities.length === VEHICLE_LIMITS.numWheels &&
    def.wheelDensities.every((d) => within(d, VEHICLE_LIMITS.wheelDensity)) &&
    within(def.wheelTorque, VEHICLE_LIMITS.wheelTorque) &&
    within(def.wheelSpeed, VEHICLE_LIMITS.wheelSpeed)
  );
}

/** A 2D point relative to the body centre. */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Body polygon vertices: vertex `i` lies at angle `i * 360 / n` degrees,
 * `bodyPoints[i]` away from the centre, counter-clockwise from +x.
 */
export function bodyVertices(def: VehicleDefinition): Point[] {
  const n = def.bodyPoints.length;
  const step = (2 * Math.PI) / n;
  return def.bodyPoints.map((distance, i) => ({
    x: distance * Math.cos(i * step),
    y: distance * Math.sin(i * step),
  }));
}
