export {
  collectFilePaths,
  loadSourceUnit,
  resolveUnitName,
  toRelativePath,
  type SourceFileLoaderOptions,
  type SourceUnit,
} from './source-files.js';
