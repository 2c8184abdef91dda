// Bucket count used when neither the request nor HISTOGRAM_BUCKETS sets one
export const DEFAULT_HISTOGRAM_BUCKETS = 10;
// Upper bound on the bucket count a request may ask for
export const MAX_HISTOGRAM_BUCKETS = 50;
// Characters accepted in the grades field unless MAX_INPUT_LENGTH overrides it
export const DEFAULT_MAX_INPUT_LENGTH = 100_000;
// Largest grade magnitude accepted; keeps sums and bucket spans finite
export const MAX_GRADE_MAGNITUDE = 1e100;
