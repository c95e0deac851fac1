/**
 * Supervisor connection states.
 *
 * idle -> discovering -> connecting -> subscribing -> streaming
 * Any state can move to failed, which always leads back to discovering
 * after a delay. stopped is entered only on cancellation.
 */
export type ConnectionState =
  | 'idle'
  | 'discovering'
  | 'connecting'
  | 'subscribing'
  | 'streaming'
  | 'failed'
  | 'stopped';

/**
 * Stages reported by a session while it is being opened.
 */
export type OpenStage = 'discovering' | 'connecting' | 'subscribing';
