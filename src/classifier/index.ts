export { classify, detectSignals, isTrivial, hasBackReference, GENERAL_MIN_COMPLEXITY } from './query-classifier'
export { detectLanguage, LANGUAGE_NAMES } from './language'
