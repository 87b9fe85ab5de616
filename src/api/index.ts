export {
    BrainliftApi,
    type Brainlift,
    type BrainliftNode,
    type BrainliftSource,
    type QualityDimensions,
    type SubjectSource,
} from './BrainliftApi.js';
export { DemoBrainlifts, DEMO_USER_ID } from './DemoBrainlifts.js';
