import { createStore, type Mutate, type StoreApi } from "zustand/vanilla";
import { immer } from "zustand/middleware/immer";
import type { Draft } from "immer";
import type {
  PatternState,
  PatternMeta,
  LayerTrack,
  LayerFrame,
  LayerGroup,
  FrameWindow,
  FrameIndex,
  Id,
} from "./types.js";
import type { LayerAction, LayerActionInput } from "../automation/types.js";
import { validateAction, validateWindow } from "../automation/validate.js";
import { storedFrame, storedFrameIndices } from "../automation/pipeline.js";
import { render, type RenderObserver } from "../render/compositor.js";
import {
  assertBufferLength,
  assertDimensions,
  assertPixel,
  blackBuffer,
  type Pixel,
  type PixelBuffer,
} from "../pixel/types.js";
import { assertEditToken, nextEditContext, tokenFor, type EditToken, type EditScope } from "../edit/context.js";
import {
  FrameExistsError,
  GroupNotFoundError,
  MissingFrameError,
  RenderInProgressError,
  StructuralError,
  TrackLockedError,
  TrackNotFoundError,
} from "../edit/errors.js";
import { copyFrame, duplicateInto, moveFrameIn, resizeBuffer, shiftForDelete, shiftForInsert } from "./frames.js";

/** Generate unique ID */
export const generateId = (): Id => {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
};

/** Options for a fresh pattern */
export interface PatternInit {
  name?: string;
  width: number;
  height: number;
  frameCount?: number;
}

/** Track fields a caller may set when adding a track */
export type TrackInput = Partial<Omit<LayerTrack, "id" | "frames" | "automation">>;

/** Track-level properties editable through an edit token */
export type TrackPatch = Partial<Pick<LayerTrack, "name" | "visible" | "opacity" | "locked" | "groupId" | "window">>;

export type GroupPatch = Partial<Omit<LayerGroup, "id">>;

/** Fields of a stored frame an edit may set */
export interface FramePatch {
  pixels?: PixelBuffer;
  visibleOverride?: boolean | null;
  opacityOverride?: number | null;
}

/** Pattern actions */
interface PatternActions {
  // Pattern operations
  setName: (name: string) => void;
  setFrameCount: (count: number) => void;
  resize: (width: number, height: number) => void;
  insertFrames: (index: FrameIndex, count?: number) => void;
  deleteFrames: (index: FrameIndex, count?: number) => void;
  duplicateFrame: (src: FrameIndex, dest: FrameIndex) => void;
  moveFrame: (src: FrameIndex, dest: FrameIndex) => void;

  // Track operations
  addTrack: (input?: TrackInput) => LayerTrack;
  removeTrack: (id: Id) => boolean;
  getTrack: (id: Id) => LayerTrack | undefined;
  getTracks: () => LayerTrack[];

  // Group operations
  createGroup: (name: string, patch?: Omit<GroupPatch, "name">) => LayerGroup;
  updateGroup: (id: Id, patch: GroupPatch) => LayerGroup;
  removeGroup: (id: Id) => boolean;

  // Edit context
  beginEdit: (trackId: Id, frameIndex: FrameIndex) => EditToken;
  endEdit: () => void;

  // Frame authoring (frame-scoped tokens)
  createFrame: (token: EditToken, pixels?: PixelBuffer) => LayerFrame;
  deleteFrame: (token: EditToken) => void;
  getFrameForEdit: (token: EditToken) => LayerFrame;
  editFrame: (token: EditToken, recipe: (frame: Draft<LayerFrame>) => void) => LayerFrame;
  updateFrame: (token: EditToken, patch: FramePatch) => LayerFrame;
  setPixel: (token: EditToken, x: number, y: number, pixel: Pixel) => void;
  copyFrameToFrames: (token: EditToken, targets: readonly FrameIndex[]) => FrameIndex[];
  getFrameForRead: (trackId: Id, frameIndex: FrameIndex) => LayerFrame | undefined;

  // Track authoring (track-scoped tokens)
  setAction: (token: EditToken, action: LayerActionInput) => LayerAction;
  removeAction: (token: EditToken, actionId: Id) => boolean;
  reorderTrack: (token: EditToken, zIndex: number) => void;
  updateTrack: (token: EditToken, patch: TrackPatch) => LayerTrack;

  // Rendering
  renderFrame: (frameIndex: FrameIndex, observer?: RenderObserver) => PixelBuffer;
  renderAll: () => PixelBuffer[];
  isRendering: () => boolean;

  /** Plain pattern document without the actions */
  snapshot: () => PatternState;
}

/** Combined store type */
export type PatternStore = PatternState & PatternActions;

export type PatternStoreApi = Mutate<StoreApi<PatternStore>, [["zustand/immer", never]]>;

/** Create a fresh, empty pattern document */
export function createPatternState(init: PatternInit): PatternState {
  assertDimensions(init.width, init.height);
  const frameCount = init.frameCount ?? 1;
  if (!Number.isInteger(frameCount) || frameCount < 1) {
    throw new StructuralError(`Frame count must be a positive integer (got ${frameCount})`);
  }
  const now = new Date();
  return {
    meta: {
      id: generateId(),
      name: init.name ?? "Untitled Pattern",
      width: init.width,
      height: init.height,
      frameCount,
      createdAt: now,
      updatedAt: now,
    },
    tracks: [],
    groups: [],
    editContext: null,
  };
}

/**
 * Check a loaded document before it is used: dimensions, every stored frame's
 * pixel count and values, and track/action windows.
 */
export function validatePatternState(state: PatternState): void {
  const { width, height } = state.meta;
  assertDimensions(width, height);
  for (const track of state.tracks) {
    validateWindow(track.window, `track ${track.id}`);
    for (const action of track.automation) validateAction(action);
    for (const index of storedFrameIndices(track)) {
      const frame = storedFrame(track, index);
      if (!frame) continue;
      try {
        assertBufferLength(frame.pixels, width, height);
        frame.pixels.forEach(assertPixel);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new StructuralError(`Track ${track.id}, frame ${index}: ${reason}`);
      }
    }
  }
}

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

function requireTrack<T extends { id: Id }>(tracks: T[], id: Id): T {
  const track = tracks.find((t) => t.id === id);
  if (!track) throw new TrackNotFoundError(id);
  return track;
}

function requireGroup<T extends { id: Id }>(groups: T[], id: Id): T {
  const group = groups.find((g) => g.id === id);
  if (!group) throw new GroupNotFoundError(id);
  return group;
}

function touch(meta: Draft<PatternMeta>): void {
  meta.updatedAt = new Date();
}

function assertFrameInRange(index: FrameIndex, frameCount: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= frameCount) {
    throw new StructuralError(`Frame ${index} is outside the pattern (0-${frameCount - 1})`);
  }
}

function assertPositiveCount(count: number, what: string): void {
  if (!Number.isInteger(count) || count < 1) {
    throw new StructuralError(`${what} must be a positive integer (got ${count})`);
  }
}

/**
 * Create a pattern store.
 *
 * Authoring goes through a single edit context; rendering reads the frozen
 * state and never touches it. The render lock and the epoch counter live in
 * this closure, one per store.
 */
export function createPatternStore(initial: PatternState): PatternStoreApi {
  validatePatternState(initial);

  let renderDepth = 0;
  let lastEpoch = initial.editContext?.epoch ?? 0;

  const assertNotRendering = (operation: string): void => {
    if (renderDepth > 0) throw new RenderInProgressError(operation);
  };

  return createStore<PatternStore>()(
    immer((set, get) => {
      /** Token check plus the render lock; returns the targeted track. */
      const authorize = (token: EditToken, scope: EditScope, operation: string): LayerTrack => {
        assertNotRendering(operation);
        const state = get();
        assertEditToken(state.editContext, token, scope, operation);
        return requireTrack(state.tracks, token.trackId);
      };

      const authorizeContent = (token: EditToken, operation: string): LayerTrack => {
        const track = authorize(token, "frame", operation);
        if (track.locked) throw new TrackLockedError(track.id);
        return track;
      };

      const readFrame = (trackId: Id, frameIndex: FrameIndex): LayerFrame => {
        const frame = storedFrame(requireTrack(get().tracks, trackId), frameIndex);
        if (!frame) throw new MissingFrameError(trackId, frameIndex);
        return frame;
      };

      return {
        ...initial,

        // ============ Pattern Operations ============

        setName: (name) => {
          assertNotRendering("rename pattern");
          set((state) => {
            state.meta.name = name;
            touch(state.meta);
          });
        },

        setFrameCount: (count) => {
          assertNotRendering("set frame count");
          assertPositiveCount(count, "Frame count");
          set((state) => {
            state.meta.frameCount = count;
            touch(state.meta);
          });
        },

        resize: (width, height) => {
          assertNotRendering("resize pattern");
          assertDimensions(width, height);
          set((state) => {
            const { width: fromWidth, height: fromHeight } = state.meta;
            for (const track of state.tracks) {
              for (const index of storedFrameIndices(track)) {
                const frame = track.frames[index];
                if (frame) frame.pixels = resizeBuffer(frame.pixels, fromWidth, fromHeight, width, height);
              }
            }
            state.meta.width = width;
            state.meta.height = height;
            touch(state.meta);
          });
        },

        insertFrames: (index, count = 1) => {
          assertNotRendering("insert frames");
          assertPositiveCount(count, "Insert count");
          set((state) => {
            for (const track of state.tracks) shiftForInsert(track, index, count);
            state.meta.frameCount += count;
            state.editContext = null;
            touch(state.meta);
          });
        },

        deleteFrames: (index, count = 1) => {
          assertNotRendering("delete frames");
          assertPositiveCount(count, "Delete count");
          set((state) => {
            const removed = Math.max(0, Math.min(count, state.meta.frameCount - index));
            if (removed === state.meta.frameCount) {
              throw new StructuralError("Cannot delete every frame of a pattern");
            }
            for (const track of state.tracks) shiftForDelete(track, index, count);
            state.meta.frameCount -= removed;
            state.editContext = null;
            touch(state.meta);
          });
        },

        duplicateFrame: (src, dest) => {
          assertNotRendering("duplicate frame");
          set((state) => {
            for (const track of state.tracks) duplicateInto(track, src, dest);
            state.meta.frameCount += 1;
            state.editContext = null;
            touch(state.meta);
          });
        },

        moveFrame: (src, dest) => {
          assertNotRendering("move frame");
          const { frameCount } = get().meta;
          assertFrameInRange(src, frameCount);
          assertFrameInRange(dest, frameCount);
          if (src === dest) return;
          set((state) => {
            for (const track of state.tracks) moveFrameIn(track, src, dest);
            state.editContext = null;
            touch(state.meta);
          });
        },

        // ============ Track Operations ============

        addTrack: (input = {}) => {
          assertNotRendering("add track");
          const { tracks } = get();
          const window: FrameWindow = input.window ?? { startFrame: 0, endFrame: null };
          validateWindow(window, "track");
          const track: LayerTrack = {
            id: generateId(),
            name: input.name ?? `Layer ${tracks.length + 1}`,
            zIndex: input.zIndex ?? tracks.reduce((max, t) => Math.max(max, t.zIndex + 1), 0),
            visible: input.visible ?? true,
            opacity: clamp01(input.opacity ?? 1),
            locked: input.locked ?? false,
            groupId: input.groupId ?? null,
            window: { ...window },
            frames: {},
            automation: [],
          };
          if (track.groupId !== null) requireGroup(get().groups, track.groupId);
          set((state) => {
            state.tracks.push(track);
            touch(state.meta);
          });
          return requireTrack(get().tracks, track.id);
        },

        removeTrack: (id) => {
          assertNotRendering("remove track");
          if (!get().tracks.some((t) => t.id === id)) return false;
          set((state) => {
            state.tracks = state.tracks.filter((t) => t.id !== id);
            if (state.editContext?.trackId === id) state.editContext = null;
            touch(state.meta);
          });
          return true;
        },

        getTrack: (id) => get().tracks.find((t) => t.id === id),

        getTracks: () => [...get().tracks],

        // ============ Group Operations ============

        createGroup: (name, patch = {}) => {
          assertNotRendering("create group");
          const group: LayerGroup = {
            id: generateId(),
            name,
            visible: patch.visible ?? true,
            opacity: clamp01(patch.opacity ?? 1),
          };
          set((state) => {
            state.groups.push(group);
            touch(state.meta);
          });
          return requireGroup(get().groups, group.id);
        },

        updateGroup: (id, patch) => {
          assertNotRendering("update group");
          requireGroup(get().groups, id);
          set((state) => {
            const group = requireGroup(state.groups, id);
            if (patch.name !== undefined) group.name = patch.name;
            if (patch.visible !== undefined) group.visible = patch.visible;
            if (patch.opacity !== undefined) group.opacity = clamp01(patch.opacity);
            touch(state.meta);
          });
          return requireGroup(get().groups, id);
        },

        removeGroup: (id) => {
          assertNotRendering("remove group");
          if (!get().groups.some((g) => g.id === id)) return false;
          set((state) => {
            state.groups = state.groups.filter((g) => g.id !== id);
            for (const track of state.tracks) {
              if (track.groupId === id) track.groupId = null;
            }
            touch(state.meta);
          });
          return true;
        },

        // ============ Edit Context ============

        beginEdit: (trackId, frameIndex) => {
          assertNotRendering("begin edit");
          requireTrack(get().tracks, trackId);
          if (!Number.isInteger(frameIndex) || frameIndex < 0) {
            throw new StructuralError(`Invalid frame index ${frameIndex}`);
          }
          const context = nextEditContext(lastEpoch, trackId, frameIndex);
          lastEpoch = context.epoch;
          set((state) => {
            state.editContext = context;
          });
          return tokenFor(context);
        },

        endEdit: () => {
          set((state) => {
            state.editContext = null;
          });
        },

        // ============ Frame Authoring ============

        createFrame: (token, pixels) => {
          const track = authorizeContent(token, "create frame");
          const { width, height } = get().meta;
          if (storedFrame(track, token.frameIndex)) {
            throw new FrameExistsError(track.id, token.frameIndex);
          }
          const content = pixels ? pixels.map((p): Pixel => [p[0], p[1], p[2]]) : blackBuffer(width, height);
          assertBufferLength(content, width, height);
          content.forEach(assertPixel);

          set((state) => {
            const target = requireTrack(state.tracks, token.trackId);
            target.frames[token.frameIndex] = {
              pixels: content,
              visibleOverride: null,
              opacityOverride: null,
            };
            touch(state.meta);
          });
          return readFrame(token.trackId, token.frameIndex);
        },

        deleteFrame: (token) => {
          const track = authorizeContent(token, "delete frame");
          if (!storedFrame(track, token.frameIndex)) {
            throw new MissingFrameError(track.id, token.frameIndex);
          }
          set((state) => {
            const target = requireTrack(state.tracks, token.trackId);
            delete target.frames[token.frameIndex];
            touch(state.meta);
          });
        },

        getFrameForEdit: (token) => {
          authorizeContent(token, "edit frame");
          return readFrame(token.trackId, token.frameIndex);
        },

        editFrame: (token, recipe) => {
          authorizeContent(token, "edit frame");
          readFrame(token.trackId, token.frameIndex);
          const { width, height } = get().meta;
          set((state) => {
            const frame = requireTrack(state.tracks, token.trackId).frames[token.frameIndex];
            if (!frame) throw new MissingFrameError(token.trackId, token.frameIndex);
            recipe(frame);
            // Throwing here discards the whole update
            assertBufferLength(frame.pixels, width, height);
            frame.pixels.forEach(assertPixel);
            if (frame.opacityOverride !== null) frame.opacityOverride = clamp01(frame.opacityOverride);
            touch(state.meta);
          });
          return readFrame(token.trackId, token.frameIndex);
        },

        updateFrame: (token, patch) =>
          get().editFrame(token, (frame) => {
            if (patch.pixels !== undefined) {
              frame.pixels = patch.pixels.map((p): Pixel => [p[0], p[1], p[2]]);
            }
            if (patch.visibleOverride !== undefined) frame.visibleOverride = patch.visibleOverride;
            if (patch.opacityOverride !== undefined) frame.opacityOverride = patch.opacityOverride;
          }),

        setPixel: (token, x, y, pixel) => {
          const { width, height } = get().meta;
          if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= width || y >= height) {
            throw new StructuralError(`Pixel (${x}, ${y}) is outside the ${width}x${height} matrix`);
          }
          assertPixel(pixel);
          get().editFrame(token, (frame) => {
            frame.pixels[y * width + x] = [pixel[0], pixel[1], pixel[2]];
          });
        },

        copyFrameToFrames: (token, targets) => {
          authorizeContent(token, "copy frame");
          const source = readFrame(token.trackId, token.frameIndex);
          const { frameCount } = get().meta;
          targets.forEach((target) => assertFrameInRange(target, frameCount));
          const written = [...new Set(targets)].filter((target) => target !== token.frameIndex);
          set((state) => {
            const track = requireTrack(state.tracks, token.trackId);
            for (const target of written) track.frames[target] = copyFrame(source);
            touch(state.meta);
          });
          return written;
        },

        getFrameForRead: (trackId, frameIndex) => {
          const track = get().tracks.find((t) => t.id === trackId);
          return track ? storedFrame(track, frameIndex) : undefined;
        },

        // ============ Track Authoring ============

        setAction: (token, input) => {
          authorize(token, "track", "set action");
          validateAction(input);
          const action: LayerAction = {
            id: input.id ?? generateId(),
            ...(input.name !== undefined ? { name: input.name } : {}),
            startFrame: input.startFrame,
            endFrame: input.endFrame,
            params: { ...input.params },
          };
          set((state) => {
            const track = requireTrack(state.tracks, token.trackId);
            const existing = track.automation.findIndex((a) => a.id === action.id);
            if (existing === -1) {
              track.automation.push(action);
            } else {
              track.automation[existing] = action;
            }
            touch(state.meta);
          });
          return action;
        },

        removeAction: (token, actionId) => {
          const track = authorize(token, "track", "remove action");
          if (!track.automation.some((a) => a.id === actionId)) return false;
          set((state) => {
            const target = requireTrack(state.tracks, token.trackId);
            target.automation = target.automation.filter((a) => a.id !== actionId);
            touch(state.meta);
          });
          return true;
        },

        reorderTrack: (token, zIndex) => {
          authorize(token, "track", "reorder track");
          if (!Number.isInteger(zIndex)) {
            throw new StructuralError(`z-index must be an integer (got ${zIndex})`);
          }
          set((state) => {
            requireTrack(state.tracks, token.trackId).zIndex = zIndex;
            touch(state.meta);
          });
        },

        updateTrack: (token, patch) => {
          authorize(token, "track", "update track");
          if (patch.window !== undefined) validateWindow(patch.window, "track");
          if (patch.groupId !== undefined && patch.groupId !== null) {
            requireGroup(get().groups, patch.groupId);
          }
          set((state) => {
            const track = requireTrack(state.tracks, token.trackId);
            if (patch.name !== undefined) track.name = patch.name;
            if (patch.visible !== undefined) track.visible = patch.visible;
            if (patch.opacity !== undefined) track.opacity = clamp01(patch.opacity);
            if (patch.locked !== undefined) track.locked = patch.locked;
            if (patch.groupId !== undefined) track.groupId = patch.groupId;
            if (patch.window !== undefined) track.window = { ...patch.window };
            touch(state.meta);
          });
          return requireTrack(get().tracks, token.trackId);
        },

        // ============ Rendering ============

        renderFrame: (frameIndex, observer) => {
          const { tracks, groups, meta } = get();
          renderDepth++;
          try {
            return render(tracks, frameIndex, {
              width: meta.width,
              height: meta.height,
              groups,
              observer,
            });
          } finally {
            renderDepth--;
          }
        },

        renderAll: () => {
          const frames: PixelBuffer[] = [];
          for (let i = 0; i < get().meta.frameCount; i++) {
            frames.push(get().renderFrame(i));
          }
          return frames;
        },

        isRendering: () => renderDepth > 0,

        // ============ Serialization ============

        snapshot: () => {
          const { meta, tracks, groups, editContext } = get();
          return { meta, tracks, groups, editContext };
        },
      };
    })
  );
}
