/**
 * Matrix Utilities
 *
 * Applies glTF 4x4 matrices (column-major, 16 elements) to points and directions.
 */

export type Vec3 = [number, number, number];

/**
 * Transforms a point, including translation
 */
export function transformPoint(m: ArrayLike<number>, p: ArrayLike<number>): Vec3 {
  const x = p[0], y = p[1], z = p[2];
  const w = m[3] * x + m[7] * y + m[11] * z + m[15] || 1;
  return [
    (m[0] * x + m[4] * y + m[8] * z + m[12]) / w,
    (m[1] * x + m[5] * y + m[9] * z + m[13]) / w,
    (m[2] * x + m[6] * y + m[10] * z + m[14]) / w,
  ];
}

/**
 * Transforms a direction by the upper 3x3 and renormalises it.
 * Non-uniform scale is not compensated.
 */
export function transformDirection(m: ArrayLike<number>, d: ArrayLike<number>): Vec3 {
  const x = m[0] * d[0] + m[4] * d[1] + m[8] * d[2];
  const y = m[1] * d[0] + m[5] * d[1] + m[9] * d[2];
  const z = m[2] * d[0] + m[6] * d[1] + m[10] * d[2];
  const length = Math.hypot(x, y, z);
  return length > 0 ? [x / length, y / length, z / length] : [0, 0, 0];
}
