export {
  isPathWithin,
  resolveWithinRoot,
  resolveWithinRootSafe,
  safeRealpath,
  toRelativePosix,
  pathExists,
  isRegularFile,
  isDirectory,
  isTextSample,
  readTextFile,
} from './paths.js';
