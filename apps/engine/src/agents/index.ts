export { IntentClassifier } from './IntentClassifier';
export { JourneyMapper } from './JourneyMapper';
export { ContentTypeClassifier, ContentTypeContext } from './ContentTypeClassifier';
export { BusinessStrategist, StrategyContext } from './BusinessStrategist';
export { HumanInputIdentifier, InputPlanContext } from './HumanInputIdentifier';
export {
    EeatAssessor,
    EeatContext,
    EEAT_WEIGHTS,
    weightedEeatScore,
    heuristicEeatScores,
} from './EeatAssessor';
export {
    QualityScorer,
    QualityContext,
    QUALITY_FACTOR_WEIGHTS,
    weightedQualityScore,
    heuristicQualityScore,
    hasHumanInputs,
} from './QualityScorer';
export { parseStructured, clampScore } from './structured';
