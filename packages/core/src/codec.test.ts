import { describe, expect, it } from "vitest";
import { decodeSnapshot, encodeSnapshot } from "./codec.js";
import { createCoordinateTransform } from "./coordinates.js";
import { InvalidPayloadError, MalformedReferenceError, UnsupportedVersionError } from "./errors.js";
import { createEmptySnapshot, type MeshSnapshot } from "./snapshot.js";

function quadSnapshot(): MeshSnapshot {
  const snapshot = createEmptySnapshot("RH_Yup");
  snapshot.vertices = [[0, 0, 0], [1, 0, 0], [1, 1, 0], [0, 1, 0]];
  snapshot.polygons = [{ vertices: [0, 1, 2, 3], material: null, isSubdivisionSurface: false, origin: "regular" }];
  return snapshot;
}

function richSnapshot(): MeshSnapshot {
  const snapshot = quadSnapshot();
  snapshot.metadata = {
    sourceApp: "meshbridge",
    timestamp: "2026-01-02T03:04:05.000Z",
    unitScale: 1,
    object: {
      name: "Head",
      transform: { translation: [0, 1.5, -2], rotation: [0, Math.SQRT1_2, 0, Math.SQRT1_2], scale: [1, 2, 1] },
    },
  };
  snapshot.polygons[0] = { vertices: [0, 1, 2, 3], material: 0, isSubdivisionSurface: true, origin: "regular" };
  snapshot.materials = [{ name: "Skin", diffuse: [0.5, 0.25, 0.125], texturePath: "skin.png" }];
  snapshot.uvMaps = [{ name: "UVMap", primary: true, values: [{ polygon: 0, corner: 3, value: [0.1, 0.9] }] }];
  snapshot.colorMaps = [{ name: "Col", kind: "RGBA", values: [{ polygon: 0, corner: 0, value: [1, 0, 0, 0.5] }] }];
  snapshot.weightMaps = [{ name: "Bone", values: [{ vertex: 1, value: 0.3 }] }];
  snapshot.morphs = [{ name: "Smile", kind: "absolute", values: [{ vertex: 2, value: [1.123456789, 2, 3] }] }];
  snapshot.subdivisionWeights = [{ edge: [1, 2], weight: 0.7 }];
  snapshot.selectionSets = [
    { name: "Corner", kind: "vertex", elements: [0, 3] },
    { name: "_Freestyle", kind: "edge", edges: [[0, 1]] },
    { name: "All", kind: "polygon", elements: [0] },
  ];
  return snapshot;
}

function payloadWith(overrides: Record<string, unknown>): string {
  return JSON.stringify({ ...JSON.parse(encodeSnapshot(quadSnapshot())), ...overrides });
}

describe("snapshot codec", () => {
  it("encodes the quad with its convention tag and version", () => {
    const payload = JSON.parse(encodeSnapshot(quadSnapshot()));
    expect(payload.schemaVersion).toBe(2);
    expect(payload.coordinateConvention).toBe("RH_Yup");
    expect(payload.vertices).toEqual([[0, 0, 0], [1, 0, 0], [1, 1, 0], [0, 1, 0]]);
    expect(payload.polygons).toEqual([{ vertices: [0, 1, 2, 3], material: null, isSubdivisionSurface: false, origin: "regular" }]);
  });

  it("decodes the quad into Z-up positions for a Z-up host", () => {
    const snapshot = decodeSnapshot(encodeSnapshot(quadSnapshot()));
    const transform = createCoordinateTransform("LH_Zup", snapshot.coordinateConvention);
    expect(snapshot.vertices.map((position) => transform.toHost(position))).toEqual([
      [0, 0, 0],
      [1, 0, 0],
      [1, 0, 1],
      [0, 0, 1],
    ]);
  });

  it("round-trips every channel", () => {
    const text = encodeSnapshot(richSnapshot());
    const decoded = decodeSnapshot(text);
    expect(decoded).toEqual(richSnapshot());
    expect(encodeSnapshot(decoded)).toBe(text);
  });

  it("writes a single line without indentation", () => {
    expect(encodeSnapshot(quadSnapshot(), { indent: 0 })).not.toContain("\n");
  });

  it("refuses to encode a snapshot with dangling references", () => {
    const snapshot = quadSnapshot();
    snapshot.weightMaps = [{ name: "Bone", values: [{ vertex: 9, value: 1 }] }];
    expect(() => encodeSnapshot(snapshot)).toThrow(MalformedReferenceError);
  });

  it("refuses to encode values a decoder would reject", () => {
    const notFinite = quadSnapshot();
    notFinite.vertices[1] = [1, Number.NaN, 0];
    try {
      encodeSnapshot(notFinite);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidPayloadError);
      expect(error instanceof InvalidPayloadError ? error.path : null).toBe("vertices[1][1]");
    }

    const tooBright = quadSnapshot();
    tooBright.materials = [{ name: "Glow", diffuse: [2, 0.5, 0.5], texturePath: null }];
    expect(() => encodeSnapshot(tooBright)).toThrow(
      "Number must be less than or equal to 1 at path materials[0].diffuse[0]",
    );
  });

  it("keeps the source object in the metadata without touching positions", () => {
    const decoded = decodeSnapshot(encodeSnapshot(richSnapshot()));
    expect(decoded.metadata?.object?.name).toBe("Head");
    expect(decoded.metadata?.object?.transform.scale).toEqual([1, 2, 1]);
    expect(decoded.vertices).toEqual(richSnapshot().vertices);
  });

  it("rejects a unit scale that is not positive", () => {
    const text = payloadWith({ metadata: { sourceApp: "x", timestamp: "t", unitScale: 0 } });
    expect(() => decodeSnapshot(text)).toThrow(InvalidPayloadError);
  });

  it("ignores unknown top-level fields and defaults missing channels", () => {
    const text = JSON.stringify({
      schemaVersion: 2,
      coordinateConvention: "LH_Zup",
      vertices: [[0, 0, 0], [1, 0, 0], [0, 1, 0]],
      polygons: [{ vertices: [0, 1, 2], origin: "regular" }],
      futureField: { anything: true },
    });
    const snapshot = decodeSnapshot(text);
    expect(snapshot.polygons).toEqual([{ vertices: [0, 1, 2], material: null, isSubdivisionSurface: false, origin: "regular" }]);
    expect(snapshot.uvMaps).toEqual([]);
    expect(snapshot.selectionSets).toEqual([]);
    expect("futureField" in snapshot).toBe(false);
  });

  it("rejects a future schema version", () => {
    expect(() => decodeSnapshot(payloadWith({ schemaVersion: 3 }))).toThrow(UnsupportedVersionError);
    expect(() => decodeSnapshot(payloadWith({ schemaVersion: 3 }))).toThrow(
      "schemaVersion 3 is not supported (supported: 1, 2)",
    );
  });

  it("fails with MALFORMED_REFERENCE for a polygon vertex past the vertex count", () => {
    const text = payloadWith({
      polygons: [{ vertices: [0, 1, 4], material: null, isSubdivisionSurface: false, origin: "regular" }],
    });
    try {
      decodeSnapshot(text);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedReferenceError);
      expect(error instanceof MalformedReferenceError ? [error.code, error.path] : null).toEqual([
        "MALFORMED_REFERENCE",
        "polygons[0].vertices[2]",
      ]);
    }
  });

  it("treats negative ids as bad references", () => {
    const text = payloadWith({ weightMaps: [{ name: "Bone", values: [{ vertex: -1, value: 0.5 }] }] });
    expect(() => decodeSnapshot(text)).toThrow("vertex id -1 is out of range [0, 4)");
  });

  it("checks face-corner indices against the polygon size", () => {
    const text = payloadWith({
      uvMaps: [{ name: "UVMap", primary: true, values: [{ polygon: 0, corner: 4, value: [0, 0] }] }],
    });
    expect(() => decodeSnapshot(text)).toThrow("corner 4 is out of range for polygon 0 with 4 vertices");
  });

  it("checks crease edges", () => {
    const text = payloadWith({ subdivisionWeights: [{ edge: [3, 7], weight: 0.5 }] });
    expect(() => decodeSnapshot(text)).toThrow(MalformedReferenceError);
  });

  it("rejects text that is not a JSON object", () => {
    expect(() => decodeSnapshot("not json")).toThrow(InvalidPayloadError);
    expect(() => decodeSnapshot("[1, 2]")).toThrow("payload root must be an object");
    expect(() => decodeSnapshot('{"coordinateConvention":"RH_Yup"}')).toThrow("schemaVersion must be an integer");
  });

  it("reports shape errors with the offending path", () => {
    const text = payloadWith({ coordinateConvention: "Y_up" });
    try {
      decodeSnapshot(text);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidPayloadError);
      expect(error instanceof InvalidPayloadError ? error.path : null).toBe("coordinateConvention");
    }
  });

  it("rejects out-of-range weights and two primary uv maps", () => {
    expect(() => decodeSnapshot(payloadWith({ weightMaps: [{ name: "W", values: [{ vertex: 0, value: 2 }] }] }))).toThrow(
      InvalidPayloadError,
    );
    const twoPrimary = payloadWith({
      uvMaps: [
        { name: "A", primary: true, values: [] },
        { name: "B", primary: true, values: [] },
      ],
    });
    expect(() => decodeSnapshot(twoPrimary)).toThrow("at most one uv map can be primary");
  });

  it("upgrades version 1 payloads", () => {
    const text = JSON.stringify({
      schemaVersion: 1,
      coordinateConvention: "RH_Yup",
      vertices: [[0, 0, 0], [1, 0, 0], [0, 1, 0]],
      polygons: [{ vertices: [0, 1, 2] }],
      uvMaps: [
        { name: "First", values: [] },
        { name: "Second", values: [] },
      ],
    });
    const snapshot = decodeSnapshot(text);
    expect(snapshot.schemaVersion).toBe(2);
    expect(snapshot.polygons[0]?.origin).toBe("regular");
    expect(snapshot.uvMaps.map((uvMap) => uvMap.primary)).toEqual([true, false]);
    expect(snapshot.colorMaps).toEqual([]);
  });
});
