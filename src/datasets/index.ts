export { loadWordList, normalizeWords } from './wordlist'
export { validateWordlists, validationSummary, type FileReport, type ValidationReport } from './validator'
export { fetchWordList, parseWordListBody, WordListRequestFailed } from './fetch-words'
