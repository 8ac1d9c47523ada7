/**
 * Mouse and keyboard controls for the demo map.
 */

import { pickSystem, type MapSystem, type StarMap } from "../src/index";

export interface MapControllerState {
  hovered: number | null;
  selected: number | null;
  /** Alt held: color systems by jump count from the selection */
  showDistances: boolean;
}

/**
 * Sets up pan, zoom, hover and selection for a StarMap.
 * `onChange` runs whenever hover, selection or the distance overlay changes.
 */
export function setupMapControls(
  map: StarMap,
  systems: readonly MapSystem[],
  onChange: (state: MapControllerState) => void
): MapControllerState {
  const canvas = map.canvas;
  const state: MapControllerState = {
    hovered: null,
    selected: null,
    showDistances: false,
  };

  let isDragging = false;
  let moved = false;
  let lastX = 0;
  let lastY = 0;

  const getPointer = (event: MouseEvent): [number, number] => {
    const rect = canvas.getBoundingClientRect();
    const dpr = window.devicePixelRatio || 1;
    return [(event.clientX - rect.left) * dpr, (event.clientY - rect.top) * dpr];
  };

  canvas.addEventListener("mousedown", (e) => {
    if (e.button !== 0) return;
    isDragging = true;
    moved = false;
    lastX = e.clientX;
    lastY = e.clientY;
    canvas.style.cursor = "grabbing";
  });

  window.addEventListener("mouseup", (e) => {
    if (!isDragging) return;
    isDragging = false;
    canvas.style.cursor = "grab";

    // A click without drag selects (or clears) the hovered system
    if (!moved && e.target === canvas) {
      state.selected = state.hovered;
      onChange(state);
    }
  });

  window.addEventListener("mousemove", (e) => {
    if (isDragging) {
      const dpr = window.devicePixelRatio || 1;
      const dx = lastX - e.clientX;
      const dy = lastY - e.clientY;
      if (dx !== 0 || dy !== 0) moved = true;
      lastX = e.clientX;
      lastY = e.clientY;

      map.camera.pan(dx * dpr, dy * dpr, canvas.width, canvas.height);
      map.requestRender();
      return;
    }

    if (e.target !== canvas) return;
    const hit = pickSystem(systems, getPointer(e), map.getFrameUniforms());
    const hovered = hit ? hit.id : null;
    if (hovered !== state.hovered) {
      state.hovered = hovered;
      canvas.style.cursor = hovered === null ? "grab" : "pointer";
      onChange(state);
    }
  });

  canvas.addEventListener("wheel", (e) => {
    e.preventDefault();
    map.camera.scroll(Math.sign(e.deltaY));
    map.requestRender();
  });

  const setDistances = (show: boolean) => {
    if (show === state.showDistances) return;
    state.showDistances = show;
    onChange(state);
  };

  window.addEventListener("keydown", (e) => {
    if (e.key === "Alt") {
      e.preventDefault();
      setDistances(true);
    } else if (e.key === "Escape") {
      state.selected = null;
      onChange(state);
    }
  });

  window.addEventListener("keyup", (e) => {
    if (e.key === "Alt") setDistances(false);
  });

  window.addEventListener("blur", () => setDistances(false));

  canvas.style.cursor = "grab";
  return state;
}
