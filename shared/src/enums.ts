// Shared enums for the project

export enum RecommendationMode {
  OVERLAP = 'overlap',
  TAG_SIMILARITY = 'tag_similarity',
  RANDOM = 'random',
}

export enum CollectionKind {
  PURCHASES = 'purchases',
  WISHLIST = 'wishlist',
}

export enum ErrorCode {
  FETCH_FAILED = 'FETCH_FAILED',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  UNKNOWN = 'UNKNOWN',
}

export enum FetchFailureReason {
  NETWORK = 'network',
  AUTH = 'auth',
  PARSE = 'parse',
  ABORTED = 'aborted',
}

export enum JobState {
  WAITING = 'waiting',
  ACTIVE = 'active',
  COMPLETED = 'completed',
  FAILED = 'failed',
  DELAYED = 'delayed',
  UNKNOWN = 'unknown',
}
