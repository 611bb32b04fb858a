const SUBJECT_SUFFIXES = ['-value', '-key'];

/**
 * Topic a subject belongs to under the topic-name strategy:
 * `orders-value` and `orders-key` both map to `orders`.
 */
export function subjectToTopic(subject: string): string {
  for (const suffix of SUBJECT_SUFFIXES) {
    if (subject.endsWith(suffix) && subject.length > suffix.length) {
      return subject.slice(0, -suffix.length);
    }
  }
  return subject;
}
