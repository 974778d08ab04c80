import { TransportError, type MeshDocumentInput } from "@meshbridge/core";
import type { TransportMode } from "../config.js";
import type { ClipboardBackend } from "../transport/osClipboard.js";
import type { ClipboardTransport } from "../transport/types.js";

export function createMemoryClipboard(initial = ""): ClipboardBackend & { text: string } {
  const clipboard: ClipboardBackend & { text: string } = {
    text: initial,
    async read() {
      return clipboard.text;
    },
    async write(text) {
      clipboard.text = text;
    },
  };
  return clipboard;
}

export function createMemoryTransport(kind: TransportMode = "TemporaryFile"): ClipboardTransport & { payload: string | null } {
  const transport: ClipboardTransport & { payload: string | null } = {
    kind,
    payload: null,
    async write(text) {
      transport.payload = text;
    },
    async read() {
      if (transport.payload === null) throw new TransportError("Nothing to paste.");
      return transport.payload;
    },
  };
  return transport;
}

/** Two quads sharing the edge 1-2; the left one is selected and uses "Skin". */
export function createTwoQuadDocument(): MeshDocumentInput {
  return {
    convention: "RH_Yup",
    vertices: [
      { id: 0, position: [0, 0, 0] },
      { id: 1, position: [1, 0, 0] },
      { id: 2, position: [1, 1, 0] },
      { id: 3, position: [0, 1, 0] },
      { id: 4, position: [2, 0, 0] },
      { id: 5, position: [2, 1, 0] },
    ],
    polygons: [
      { id: 0, vertices: [0, 1, 2, 3], material: "Skin", selected: true },
      { id: 1, vertices: [1, 4, 5, 2], material: null },
    ],
    materials: [{ name: "Skin", diffuse: [0.9, 0.6, 0.5], texturePath: null }],
    weightMaps: [{ name: "Bone", values: [{ vertex: 0, value: 0.5 }, { vertex: 5, value: 1 }] }],
  };
}
