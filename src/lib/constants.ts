export const SUPPORTED_VERSIONS = [
  'ES6',
  'ES2016',
  'ES2017',
  'ES2018',
  'ES2019',
  'ES2020',
  'ES2021',
] as const;

export type VersionTag = (typeof SUPPORTED_VERSIONS)[number];

// ES2015 is the same edition as ES6; content may use either spelling.
export const VERSION_ALIASES: Record<string, VersionTag> = {
  ES2015: 'ES6',
};

export const EXPECTED_GROUP_COUNT = 6;

export const CODE_LANGUAGE = 'js';
