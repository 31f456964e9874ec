// User types

import type { Id } from './common.js';

/**
 * A person who logs sessions.
 * Registration lives outside this repository; ingestion only resolves users by name.
 */
export type User = {
  id: Id;

  /**
   * Unique lookup key, matched exactly during ingestion
   */
  username: string;

  /**
   * Credential secret as handed over by the registration flow
   */
  passkey: string;

  email: string | null;
};
