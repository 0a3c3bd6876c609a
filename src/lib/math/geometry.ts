/**
 * Body-space geometry helpers.
 *
 * Axes follow the body tracker: +X right (mediolateral), +Y up,
 * +Z forward (anteroposterior). Angles are returned in degrees.
 */

import * as THREE from "three";

const RAD2DEG = 180 / Math.PI;
const EPSILON = 0.001;

export const UP = new THREE.Vector3(0, 1, 0);

/** Horizontal (XZ plane) distance between two points. */
export function xzDistance(
  a: { x: number; z: number },
  b: { x: number; z: number },
): number {
  const dx = a.x - b.x;
  const dz = a.z - b.z;
  return Math.sqrt(dx * dx + dz * dz);
}

/** Unsigned angle between a vector and global up. */
export function angleFromVerticalDeg(v: THREE.Vector3): number {
  if (v.length() <= EPSILON) return 0;
  const cos = THREE.MathUtils.clamp(v.clone().normalize().dot(UP), -1, 1);
  return Math.acos(cos) * RAD2DEG;
}

/**
 * Sagittal (YZ) projection angle from vertical. Positive = forward.
 */
export function sagittalAngleFromVerticalDeg(v: THREE.Vector3): number {
  if (Math.hypot(v.z, v.y) <= EPSILON) return 0;
  return Math.atan2(v.z, v.y) * RAD2DEG;
}

/**
 * Frontal (XY) projection angle from vertical. Positive = toward +X.
 */
export function frontalAngleFromVerticalDeg(v: THREE.Vector3): number {
  if (Math.hypot(v.x, v.y) <= EPSILON) return 0;
  return Math.atan2(v.x, v.y) * RAD2DEG;
}

/** Sagittal angle of a hanging segment from straight down. Positive = forward. */
export function sagittalAngleFromDownDeg(v: THREE.Vector3): number {
  if (Math.hypot(v.z, v.y) <= EPSILON) return 0;
  return Math.atan2(v.z, -v.y) * RAD2DEG;
}

/** Frontal angle of a hanging segment from straight down. Positive = toward +X. */
export function frontalAngleFromDownDeg(v: THREE.Vector3): number {
  if (Math.hypot(v.x, v.y) <= EPSILON) return 0;
  return Math.atan2(v.x, -v.y) * RAD2DEG;
}

/** Angle at `vertex` between rays to `a` and `c` (0–180). */
export function threePointAngleDeg(
  a: THREE.Vector3,
  vertex: THREE.Vector3,
  c: THREE.Vector3,
): number {
  const ba = a.clone().sub(vertex);
  const bc = c.clone().sub(vertex);
  if (ba.length() <= EPSILON || bc.length() <= EPSILON) return 180;
  return ba.angleTo(bc) * RAD2DEG;
}

/** Signed angle from 2D vector a to b (counter-clockwise positive). */
export function signedAngle2D(
  a: THREE.Vector2,
  b: THREE.Vector2,
): number {
  const cross = a.x * b.y - a.y * b.x;
  const dot = a.dot(b);
  return Math.atan2(cross, dot) * RAD2DEG;
}

/** Perpendicular distance from a point to the segment start→end. */
export function pointToSegmentDistance(
  point: THREE.Vector3,
  start: THREE.Vector3,
  end: THREE.Vector3,
): number {
  const segment = new THREE.Line3(start, end);
  const closest = new THREE.Vector3();
  segment.closestPointToPoint(point, true, closest);
  return point.distanceTo(closest);
}

export function toTuple(v: THREE.Vector3): [number, number, number] {
  return [v.x, v.y, v.z];
}

export function fromTuple([x, y, z]: readonly [number, number, number]): THREE.Vector3 {
  return new THREE.Vector3(x, y, z);
}
