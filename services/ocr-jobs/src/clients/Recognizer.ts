import { Fragment, RecognizerCredentials } from '../models/job.model';

/**
 * Remote text recognition. Implementations apply their own per-call deadline
 * and never retry: a failed call is reported to the caller as is.
 */
export interface Recognizer {
  /** Exchanges credentials for an access token; throws AuthenticationError */
  authenticate(credentials: RecognizerCredentials): Promise<string>;

  /** Recognizes one page image; throws RecognitionError */
  recognize(imagePath: string, token: string, languageHint: string): Promise<Fragment[]>;
}
