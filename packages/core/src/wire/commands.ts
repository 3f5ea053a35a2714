import { REPLY_KEYWORD, VERB } from '../constants.js';
import type { Command, Reply } from '../types/wire.js';

export function checkSupportCommand(feature: string): Command {
  return { verb: VERB.checkSupport, args: [['feature', feature]] };
}

/**
 * A capability check succeeds only with `feature-support support=ok`
 */
export function isFeatureSupported(reply: Reply): boolean {
  return reply.keyword === REPLY_KEYWORD.featureSupport && reply.fields.get('support') === 'ok';
}
