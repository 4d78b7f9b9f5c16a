export { score, allGreen, allGray, isWin, GREEN, YELLOW, GRAY } from './scoring'
export { filterCandidates, isCleanWord } from './constraints'
export { validateGuess } from './validation'
