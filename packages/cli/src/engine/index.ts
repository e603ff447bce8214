export {
  Project,
  generateId,
  PROJECT_FILE_VERSION,
  DEFAULT_DIMENSIONS,
  type ProjectFile,
  type PaintPoint,
} from "./project.js";
