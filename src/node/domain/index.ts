/**
 * Domain Layer - Pure helpers with no I/O dependencies.
 */

export { classifyGitFailure, describeGitFailure } from './GitFailureClassifier'
export { extractRepoName, isValidGitUrl } from './GitUrlParser'
