export {
  UserProfile,
  emptyPreferenceUpdate,
  PROFILE_ADAPTATION_REQUEST,
} from './user-profile.js';
export {
  PreferenceExtractor,
  parsePreferenceResponse,
  PREFERENCE_EXTRACTION_PROMPT,
  PREFERENCE_EXTRACTION_PARAMS,
  type PreferenceExtractorOptions,
} from './preference-extractor.js';
