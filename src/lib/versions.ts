import { SUPPORTED_VERSIONS, type VersionTag } from './constants';

export function versionOrdinal(tag: VersionTag): number {
  return SUPPORTED_VERSIONS.indexOf(tag);
}

/** Negative when `a` shipped before `b`, zero for the same edition. */
export function compareVersions(a: VersionTag, b: VersionTag): number {
  return versionOrdinal(a) - versionOrdinal(b);
}

