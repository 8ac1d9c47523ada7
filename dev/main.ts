import {
  BACKEND_KINDS,
  PROGRAM_IDS,
  StarMap,
  VERSION,
  buildJumpSegments,
  buildRegionLabels,
  buildSovereigntyMarkers,
  buildSystemLabels,
  buildSystemMarkers,
  changedMarkerRuns,
  layoutText,
  securityColor,
  uiScale,
  withAlpha,
  type BackendKind,
  type FrameUniforms,
  type MapSelection,
  type OverlayItem,
  type ShaderSourcePair,
  type SystemMarkerInstance,
  type TextVertex,
} from "../src/index";
import { rasterizeGlyphAtlas } from "./glyphAtlas";
import { setupMapControls, type MapControllerState } from "./MapController";
import { findRoute, generateGalaxy, jumpDistances, markRoute } from "./syntheticGalaxy";

console.log(`starmap-gl v${VERSION}`);

function isBackendKind(value: string | null): value is BackendKind {
  return BACKEND_KINDS.some((kind) => kind === value);
}

function isSourcePair(value: unknown): value is ShaderSourcePair {
  return (
    typeof value === "object" &&
    value !== null &&
    "vertex" in value &&
    "fragment" in value &&
    typeof value.vertex === "string" &&
    typeof value.fragment === "string"
  );
}

/** Pull one dialect's sources out of a hot-updated programs module */
function readHotSources(module: unknown, id: string, kind: BackendKind): ShaderSourcePair | null {
  if (typeof module !== "object" || module === null || !("PROGRAM_SOURCES" in module)) return null;
  const sources: unknown = module.PROGRAM_SOURCES;
  if (typeof sources !== "object" || sources === null) return null;
  const variants: unknown = Reflect.get(sources, id);
  if (typeof variants !== "object" || variants === null) return null;
  const pair: unknown = Reflect.get(variants, kind);
  return isSourcePair(pair) ? pair : null;
}

const params = new URLSearchParams(window.location.search);
const requested = params.get("backend");
const backend: BackendKind = isBackendKind(requested) ? requested : "web";
const seed = Number(params.get("seed") ?? "1") || 1;

const canvasElement = document.getElementById("canvas");
if (!(canvasElement instanceof HTMLCanvasElement)) {
  throw new Error("Missing #canvas element");
}
const canvas = canvasElement;

const galaxy = generateGalaxy({ seed });
const { systems, regions } = galaxy;
const player = systems[0]?.id ?? null;
const destination = systems[systems.length - 1]?.id ?? null;
const route = player !== null && destination !== null ? findRoute(galaxy.jumps, player, destination) : null;
const jumps = route ? markRoute(galaxy.jumps, route) : galaxy.jumps;

const { atlas: glyphAtlas, canvas: glyphCanvas } = rasterizeGlyphAtlas();

let selection: MapSelection = { player };
let lastLabelKey = "";
let systemMarkers: SystemMarkerInstance[] = [];

const map = new StarMap({
  canvas,
  backend,
  debugStats: true,
  onBeforeRender: (uniforms) => updateLabels(uniforms),
});
const labelAtlas = map.backend.createAtlas(glyphCanvas, { format: "alpha" });

function legend(uniforms: FrameUniforms): { items: OverlayItem[]; text: TextVertex[] } {
  const scale = uiScale(uniforms.windowSize[1]);
  const swatch = 30 * scale;
  const pad = 20 * scale;
  const steps = [1, 0.8, 0.6, 0.4, 0.2, 0];

  const items: OverlayItem[] = [
    {
      kind: "quad",
      rect: { x: pad, y: pad, width: swatch * steps.length + pad * 2, height: swatch + pad * 3 + 40 * scale },
      color: [0.02, 0.02, 0.03, 0.8],
    },
  ];
  steps.forEach((security, i) => {
    items.push({
      kind: "quad",
      rect: { x: pad * 2 + i * swatch, y: pad * 2, width: swatch, height: swatch },
      color: withAlpha(securityColor(security), 1),
    });
  });

  const text = layoutText(glyphAtlas, `${backend} backend`, [pad * 2, pad * 3 + swatch], {
    fontSize: Math.max(32 * scale, 12),
    color: [0.8, 0.8, 0.8, 1],
  });
  return { items, text };
}

function updateLabels(uniforms: FrameUniforms): void {
  const { offsetX, offsetY } = map.camera;
  const key = `${uniforms.zoom}:${offsetX}:${offsetY}:${uniforms.windowSize[0]}x${uniforms.windowSize[1]}`;
  if (key === lastLabelKey) return;
  lastLabelKey = key;

  const { items, text } = legend(uniforms);
  map.setOverlay(items);
  map.setLabels(
    [
      ...buildRegionLabels(glyphAtlas, regions, uniforms),
      ...buildSystemLabels(glyphAtlas, systems, uniforms, selection),
      ...text,
    ],
    labelAtlas
  );
}

function updateScene(state: MapControllerState): void {
  const reference = state.selected ?? player;
  selection = {
    player,
    hovered: state.hovered,
    selected: state.selected,
    distances: state.showDistances && reference !== null ? jumpDistances(jumps, reference) : undefined,
  };

  // Hover and selection touch a few systems; patch those in place
  const markers = buildSystemMarkers(systems, selection);
  const runs = changedMarkerRuns(systemMarkers, markers);
  if (runs) {
    for (const run of runs) map.updateMarkers("systems", run.first, run.instances);
  } else {
    map.setMarkers("systems", markers);
  }
  systemMarkers = markers;
  map.setJumps(buildJumpSegments(systems, jumps, selection));
  lastLabelKey = "";
}

map.setMarkers("sovereignty", buildSovereigntyMarkers(systems));
updateScene(setupMapControls(map, systems, updateScene));
map.camera.setZoom(1.5);
map.start();

if (import.meta.hot) {
  import.meta.hot.accept(["../src/shaders/programs"], ([programs]) => {
    for (const id of PROGRAM_IDS) {
      const sources = readHotSources(programs, id, backend);
      if (sources) map.reloadProgram(id, sources);
    }
  });
}

console.log(`Backend: ${backend} (use ?backend=web|desktop)`);
console.log("Controls: drag to pan, scroll to zoom, click to select, hold Alt for jump distances");
