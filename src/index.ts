export * from './types/entry';
export { SUPPORTED_VERSIONS, EXPECTED_GROUP_COUNT, type VersionTag } from './lib/constants';
export {
  documentSchema,
  entrySchema,
  groupSchema,
  featureTableSchema,
  versionTag,
} from './content/schema';
export {
  loadCheatsheet,
  loadCheatsheetFile,
  loadFeatureTable,
  parseCheatsheet,
} from './content/load';
export { validateDocument, hasErrors, formatIssue, type Issue } from './lib/validate';
export { listEntries, findEntry, findGroup, entriesByVersion } from './lib/access';
export { renderMarkdown, renderEntry, renderText } from './lib/render';
export { compareVersions } from './lib/versions';
export { ContentError, NotFoundError } from './lib/errors';
