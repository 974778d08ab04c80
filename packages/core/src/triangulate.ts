import { Box2, ShapeUtils, Vector2, Vector3 } from "three";
import type { Vec3 } from "./coordinates.js";

const EPSILON = 1e-12;

/** Cross products scale with the square of the outline's size; so does the zero tolerance. */
function areaTolerance(outline: Vector2[]): number {
  const size = new Box2().setFromPoints(outline).getSize(new Vector2());
  const extent = Math.max(size.x, size.y);
  return EPSILON * extent * extent;
}

/**
 * Newell's method; works for non-planar polygons too.
 */
export function polygonNormal(points: Vec3[]): Vector3 {
  const normal = new Vector3();
  for (let i = 0; i < points.length; i += 1) {
    const [x0, y0, z0] = points[i] ?? [0, 0, 0];
    const [x1, y1, z1] = points[(i + 1) % points.length] ?? [0, 0, 0];
    normal.x += (y0 - y1) * (z0 + z1);
    normal.y += (z0 - z1) * (x0 + x1);
    normal.z += (x0 - x1) * (y0 + y1);
  }
  return normal;
}

/**
 * Project onto the plane that drops the normal's dominant axis, keeping the
 * winding counter-clockwise when seen from the normal side.
 */
export function projectToPlane(points: Vec3[]): Vector2[] {
  const normal = polygonNormal(points);
  const ax = Math.abs(normal.x);
  const ay = Math.abs(normal.y);
  const az = Math.abs(normal.z);
  if (az >= ax && az >= ay) {
    const sign = normal.z >= 0 ? 1 : -1;
    return points.map(([x, y]) => new Vector2(x * sign, y));
  }
  if (ax >= ay) {
    const sign = normal.x >= 0 ? 1 : -1;
    return points.map(([, y, z]) => new Vector2(y * sign, z));
  }
  const sign = normal.y >= 0 ? 1 : -1;
  return points.map(([x, , z]) => new Vector2(z * sign, x));
}

function cross(o: Vector2, a: Vector2, b: Vector2): number {
  return (a.x - o.x) * (b.y - o.y) - (a.y - o.y) * (b.x - o.x);
}

/**
 * A polygon can be exported as-is when its vertices are distinct and its
 * projected outline is convex and winds exactly once.
 */
export function isRegularPolygon(vertexIds: number[], points: Vec3[]): boolean {
  if (vertexIds.length < 3) return false;
  if (new Set(vertexIds).size !== vertexIds.length) return false;
  if (vertexIds.length === 3) return true;

  const outline = projectToPlane(points);
  const tolerance = areaTolerance(outline);
  const count = outline.length;
  let sign = 0;
  let turning = 0;
  for (let i = 0; i < count; i += 1) {
    const prev = outline[(i + count - 1) % count];
    const curr = outline[i];
    const next = outline[(i + 1) % count];
    if (!prev || !curr || !next) return false;
    const turn = cross(prev, curr, next);
    if (Math.abs(turn) <= tolerance) continue;
    const turnSign = turn > 0 ? 1 : -1;
    if (sign === 0) sign = turnSign;
    else if (turnSign !== sign) return false;

    const inAngle = Math.atan2(curr.y - prev.y, curr.x - prev.x);
    const outAngle = Math.atan2(next.y - curr.y, next.x - curr.x);
    let delta = outAngle - inAngle;
    while (delta <= -Math.PI) delta += Math.PI * 2;
    while (delta > Math.PI) delta -= Math.PI * 2;
    turning += delta;
  }
  // a pentagram turns the same way at every corner but winds twice
  return sign !== 0 && Math.abs(Math.abs(turning) - Math.PI * 2) < 1e-6;
}

/**
 * Split an irregular polygon into triangles.
 *
 * @returns Corner-index triplets into the input outline, wound like the input.
 * Triangles that would reuse a vertex id (the bridge of a keyhole) are dropped.
 */
export function triangulatePolygon(vertexIds: number[], points: Vec3[]): Array<[number, number, number]> {
  const outline = projectToPlane(points);
  const tolerance = areaTolerance(outline);
  const area = ShapeUtils.area(outline);
  const faces = ShapeUtils.triangulateShape(outline, []);
  const triangles: Array<[number, number, number]> = [];

  for (const face of faces) {
    const [a, b, c] = face;
    if (a === undefined || b === undefined || c === undefined) continue;
    const ids = new Set([vertexIds[a], vertexIds[b], vertexIds[c]]);
    if (ids.size !== 3) continue;
    const pa = outline[a];
    const pb = outline[b];
    const pc = outline[c];
    if (!pa || !pb || !pc) continue;
    const triangleArea = cross(pa, pb, pc);
    if (Math.abs(triangleArea) <= tolerance) continue;
    triangles.push(Math.sign(triangleArea) === Math.sign(area) ? [a, b, c] : [a, c, b]);
  }
  return triangles;
}
