export const CLEANING_CONFIG = Symbol('CLEANING_CONFIG');
export const REFERENCE_DATA = Symbol('REFERENCE_DATA');
export const BLOCKED_PHRASES = Symbol('BLOCKED_PHRASES');
export const CLEANER = Symbol('CLEANER');
export const BOILERPLATE_RULES = Symbol('BOILERPLATE_RULES');
export const REDACTION_MASKER = Symbol('REDACTION_MASKER');
export const STOPWORDS = Symbol('STOPWORDS');
