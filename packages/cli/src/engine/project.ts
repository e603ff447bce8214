/**
 * Headless Project Engine for CLI operations
 * Wraps a pattern store and hides the edit-context bookkeeping: every
 * operation opens its own edit and closes it again.
 */

import {
  createPatternState,
  createPatternStore,
  TrackNotFoundError,
  StructuralError,
  storedFrameIndices,
  type PatternState,
  type PatternMeta,
  type PatternStoreApi,
  type PatternInit,
  type LayerTrack,
  type LayerFrame,
  type LayerGroup,
  type LayerAction,
  type LayerActionInput,
  type TrackInput,
  type TrackPatch,
  type GroupPatch,
  type EditToken,
  type Pixel,
  type PixelBuffer,
  type Id,
  type FrameIndex,
} from "@ledloom/core";

export { generateId } from "@ledloom/core";

/** Project file format version */
export const PROJECT_FILE_VERSION = "1.0.0";

/** Project file format */
export interface ProjectFile {
  version: string;
  state: PatternState;
}

/** A single painted pixel */
export interface PaintPoint {
  x: number;
  y: number;
  color: Pixel;
}

/** Pattern dimensions used when none are given */
export const DEFAULT_DIMENSIONS = { width: 16, height: 16, frameCount: 1 } as const;

/**
 * Headless Project Engine
 * Manages a pattern without any UI
 */
export class Project {
  private store: PatternStoreApi;
  private filePath: string | null = null;

  constructor(name?: string, init: Partial<Omit<PatternInit, "name">> = {}) {
    this.store = createPatternStore(
      createPatternState({
        name,
        width: init.width ?? DEFAULT_DIMENSIONS.width,
        height: init.height ?? DEFAULT_DIMENSIONS.height,
        frameCount: init.frameCount ?? DEFAULT_DIMENSIONS.frameCount,
      })
    );
  }

  /** Get current state (detached copy) */
  getState(): PatternState {
    return structuredClone(this.store.getState().snapshot());
  }

  /** Get pattern metadata */
  getMeta(): PatternMeta {
    return { ...this.store.getState().meta };
  }

  /** Get file path */
  getFilePath(): string | null {
    return this.filePath;
  }

  setFilePath(path: string): void {
    this.filePath = path;
  }

  // ============ Pattern Operations ============

  setName(name: string): void {
    this.store.getState().setName(name);
  }

  setFrameCount(count: number): void {
    this.store.getState().setFrameCount(count);
  }

  resize(width: number, height: number): void {
    this.store.getState().resize(width, height);
  }

  insertFrames(index: FrameIndex, count = 1): void {
    this.assertFrameIndex(index, true);
    this.store.getState().insertFrames(index, count);
  }

  deleteFrames(index: FrameIndex, count = 1): void {
    this.assertFrameIndex(index);
    this.store.getState().deleteFrames(index, count);
  }

  duplicateFrame(src: FrameIndex, dest: FrameIndex = src + 1): void {
    this.assertFrameIndex(src);
    this.assertFrameIndex(dest, true);
    this.store.getState().duplicateFrame(src, dest);
  }

  moveFrame(src: FrameIndex, dest: FrameIndex): void {
    this.store.getState().moveFrame(src, dest);
  }

  // ============ Track Operations ============

  addTrack(input: TrackInput = {}): LayerTrack {
    return this.store.getState().addTrack(input);
  }

  removeTrack(id: Id): boolean {
    return this.store.getState().removeTrack(id);
  }

  getTrack(id: Id): LayerTrack | undefined {
    return this.store.getState().getTrack(id);
  }

  getTracks(): LayerTrack[] {
    return this.store.getState().getTracks();
  }

  /** Look a track up by id, then by exact name */
  resolveTrack(ref: string): LayerTrack {
    const tracks = this.getTracks();
    const byId = tracks.find((t) => t.id === ref);
    if (byId) return byId;

    const byName = tracks.filter((t) => t.name === ref);
    if (byName.length > 1) {
      throw new StructuralError(`Track name "${ref}" is ambiguous; use the track id`);
    }
    if (byName.length === 0) throw new TrackNotFoundError(ref);
    return byName[0];
  }

  updateTrack(id: Id, patch: TrackPatch): LayerTrack {
    return this.withEdit(id, 0, (token) => this.store.getState().updateTrack(token, patch));
  }

  reorderTrack(id: Id, zIndex: number): void {
    this.withEdit(id, 0, (token) => this.store.getState().reorderTrack(token, zIndex));
  }

  // ============ Group Operations ============

  createGroup(name: string, patch: Omit<GroupPatch, "name"> = {}): LayerGroup {
    return this.store.getState().createGroup(name, patch);
  }

  updateGroup(id: Id, patch: GroupPatch): LayerGroup {
    return this.store.getState().updateGroup(id, patch);
  }

  removeGroup(id: Id): boolean {
    return this.store.getState().removeGroup(id);
  }

  getGroups(): LayerGroup[] {
    return [...this.store.getState().groups];
  }

  // ============ Frame Operations ============

  createFrame(trackId: Id, frameIndex: FrameIndex, pixels?: PixelBuffer): LayerFrame {
    this.assertFrameIndex(frameIndex);
    return this.withEdit(trackId, frameIndex, (token) => this.store.getState().createFrame(token, pixels));
  }

  deleteFrame(trackId: Id, frameIndex: FrameIndex): void {
    this.withEdit(trackId, frameIndex, (token) => this.store.getState().deleteFrame(token));
  }

  getFrame(trackId: Id, frameIndex: FrameIndex): LayerFrame | undefined {
    return this.store.getState().getFrameForRead(trackId, frameIndex);
  }

  /** Set several pixels of an existing frame in one edit */
  paint(trackId: Id, frameIndex: FrameIndex, points: readonly PaintPoint[]): LayerFrame {
    const { width, height } = this.getMeta();
    for (const { x, y } of points) {
      if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= width || y >= height) {
        throw new StructuralError(`Pixel (${x}, ${y}) is outside the ${width}x${height} matrix`);
      }
    }
    return this.withEdit(trackId, frameIndex, (token) =>
      this.store.getState().editFrame(token, (frame) => {
        for (const { x, y, color } of points) {
          frame.pixels[y * width + x] = [color[0], color[1], color[2]];
        }
      })
    );
  }

  /** Fill an existing frame with one colour */
  fill(trackId: Id, frameIndex: FrameIndex, color: Pixel): LayerFrame {
    return this.withEdit(trackId, frameIndex, (token) =>
      this.store.getState().editFrame(token, (frame) => {
        frame.pixels = frame.pixels.map((): Pixel => [color[0], color[1], color[2]]);
      })
    );
  }

  /** Copy one stored frame over others on the same track; returns the frames written */
  copyFrame(trackId: Id, frameIndex: FrameIndex, targets: readonly FrameIndex[]): FrameIndex[] {
    this.assertFrameIndex(frameIndex);
    return this.withEdit(trackId, frameIndex, (token) => this.store.getState().copyFrameToFrames(token, targets));
  }

  setFrameOverrides(
    trackId: Id,
    frameIndex: FrameIndex,
    overrides: { visibleOverride?: boolean | null; opacityOverride?: number | null }
  ): LayerFrame {
    return this.withEdit(trackId, frameIndex, (token) => this.store.getState().updateFrame(token, overrides));
  }

  // ============ Action Operations ============

  addAction(trackId: Id, action: LayerActionInput): LayerAction {
    return this.withEdit(trackId, 0, (token) => this.store.getState().setAction(token, action));
  }

  removeAction(trackId: Id, actionId: Id): boolean {
    return this.withEdit(trackId, 0, (token) => this.store.getState().removeAction(token, actionId));
  }

  getActions(trackId: Id): LayerAction[] {
    const track = this.getTrack(trackId);
    if (!track) throw new TrackNotFoundError(trackId);
    return [...track.automation];
  }

  // ============ Rendering ============

  render(frameIndex: FrameIndex): PixelBuffer {
    this.assertFrameIndex(frameIndex);
    return this.store.getState().renderFrame(frameIndex);
  }

  renderAll(): PixelBuffer[] {
    return this.store.getState().renderAll();
  }

  // ============ Serialization ============

  toJSON(): ProjectFile {
    return {
      version: PROJECT_FILE_VERSION,
      state: { ...this.getState(), editContext: null },
    };
  }

  static fromJSON(data: ProjectFile): Project {
    if (data.version !== PROJECT_FILE_VERSION) {
      throw new StructuralError(`Unsupported project file version: ${data.version}`);
    }
    const project = new Project();
    // Convert date strings back to Date objects
    data.state.meta.createdAt = new Date(data.state.meta.createdAt);
    data.state.meta.updatedAt = new Date(data.state.meta.updatedAt);
    project.store = createPatternStore(data.state);
    return project;
  }

  // ============ Summary ============

  getSummary(): {
    name: string;
    width: number;
    height: number;
    frameCount: number;
    trackCount: number;
    storedFrameCount: number;
    actionCount: number;
    groupCount: number;
  } {
    const { meta, tracks, groups } = this.store.getState();
    return {
      name: meta.name,
      width: meta.width,
      height: meta.height,
      frameCount: meta.frameCount,
      trackCount: tracks.length,
      storedFrameCount: tracks.reduce((sum, t) => sum + storedFrameIndices(t).length, 0),
      actionCount: tracks.reduce((sum, t) => sum + t.automation.length, 0),
      groupCount: groups.length,
    };
  }

  // ============ Internals ============

  private withEdit<T>(trackId: Id, frameIndex: FrameIndex, fn: (token: EditToken) => T): T {
    const token = this.store.getState().beginEdit(trackId, frameIndex);
    try {
      return fn(token);
    } finally {
      this.store.getState().endEdit();
    }
  }

  /** `allowEnd` admits `frameCount` itself, for appending */
  private assertFrameIndex(index: FrameIndex, allowEnd = false): void {
    const { frameCount } = this.getMeta();
    const limit = allowEnd ? frameCount : frameCount - 1;
    if (!Number.isInteger(index) || index < 0 || index > limit) {
      throw new StructuralError(`Frame ${index} is outside the pattern (0-${frameCount - 1})`);
    }
  }
}
