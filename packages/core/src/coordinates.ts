export type Vec2 = [number, number];
export type Vec3 = [number, number, number];

/**
 * Spatial conventions understood by the exchange format.
 * `RH_Yup` is right-handed with +Y up; `LH_Zup` puts +Z up and flips the depth axis.
 */
export type CoordinateConvention = "RH_Yup" | "LH_Zup";

/** Quaternion as `[x, y, z, w]`. */
export type Quat = [number, number, number, number];

/** Placement of the mesh item in its scene. Carried for reference, never applied to positions. */
export interface ObjectTransform {
  translation: Vec3;
  rotation: Quat;
  scale: Vec3;
}

export interface CoordinateTransform {
  /** Host space to exchange space. */
  toExchange(pos: Vec3): Vec3;
  /** Exchange space back to host space. */
  toHost(pos: Vec3): Vec3;
}

// avoids -0 so converted values compare and serialise like the inputs
function negate(value: number): number {
  return value === 0 ? 0 : -value;
}

function yUpToZUp([x, y, z]: Vec3): Vec3 {
  return [x, negate(z), y];
}

function zUpToYUp([x, y, z]: Vec3): Vec3 {
  return [x, z, negate(y)];
}

function identity([x, y, z]: Vec3): Vec3 {
  return [x, y, z];
}

/**
 * Convert a position or delta vector between conventions.
 * Axis permutation plus one sign flip, so it is exact for every finite float.
 */
export function convertPosition(pos: Vec3, from: CoordinateConvention, to: CoordinateConvention): Vec3 {
  if (from === to) return identity(pos);
  return from === "RH_Yup" ? yUpToZUp(pos) : zUpToYUp(pos);
}

/**
 * Convert an object transform between conventions. The axis change is a
 * proper rotation, so a quaternion's vector part maps like a position and
 * its scalar part is unchanged. Scale factors follow their axes without sign.
 */
export function convertObjectTransform(
  transform: ObjectTransform,
  from: CoordinateConvention,
  to: CoordinateConvention,
): ObjectTransform {
  const [qx, qy, qz, qw] = transform.rotation;
  const [rx, ry, rz] = convertPosition([qx, qy, qz], from, to);
  const [sx, sy, sz] = transform.scale;
  return {
    translation: convertPosition(transform.translation, from, to),
    rotation: [rx, ry, rz, qw],
    scale: from === to ? [sx, sy, sz] : [sx, sz, sy],
  };
}

export function createCoordinateTransform(
  host: CoordinateConvention,
  exchange: CoordinateConvention,
): CoordinateTransform {
  return {
    toExchange: (pos) => convertPosition(pos, host, exchange),
    toHost: (pos) => convertPosition(pos, exchange, host),
  };
}

export function isCoordinateConvention(value: unknown): value is CoordinateConvention {
  return value === "RH_Yup" || value === "LH_Zup";
}
