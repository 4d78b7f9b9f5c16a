export { Matrix, dotVec } from './matrix'
export { makeFeatures, featureNames, featureSize, patternType, perSlotEntropy, dupRatio, PATTERN_TYPES } from './features'
export type { FeatureInput, PatternType } from './features'
export { LinUCB, LinUCBSnapshotSchema, type LinUCBSnapshot, type LinUCBOptions } from './lin-ucb'
export { WordleBanditEnv, turnReward, type BanditEnvConfig, type Observation, type EnvStep, type StepInfo } from './environment'
export { BanditTrainer, type TrainingConfig, type TrainingStats, type EpisodeRun } from './training'
