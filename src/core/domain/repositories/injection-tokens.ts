export const MODEL_REPOSITORY_TOKEN = 'MODEL_REPOSITORY';
export const REVIEW_REPOSITORY_TOKEN = 'REVIEW_REPOSITORY';
export const REVIEW_SETTINGS_TOKEN = 'REVIEW_SETTINGS';
