export const OCTOKIT = Symbol('OCTOKIT');
export const EVENTS_CACHE = Symbol('EVENTS_CACHE');
