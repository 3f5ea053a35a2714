import {
  type ArgumentValue,
  type Command,
  type ResolvedAddress,
  type ResolvedProbeOptions,
  VERB
} from '@probewire/core';

/**
 * Build the send-probe command for a resolved target.
 * Options left unset are omitted and mtr-packet applies its own defaults.
 */
export function buildProbeCommand(
  target: ResolvedAddress,
  options: ResolvedProbeOptions
): Command {
  const args: Array<readonly [string, ArgumentValue]> = [
    [`ip-${target.ipVersion}`, target.address],
    ['ttl', options.ttl],
    ['protocol', options.protocol]
  ];

  const optional: Array<readonly [string, ArgumentValue | undefined]> = [
    ['port', options.port],
    [`local-ip-${target.ipVersion}`, options.localIp],
    ['local-port', options.localPort],
    ['timeout', options.timeout],
    ['size', options.size],
    ['bit-pattern', options.bitPattern],
    ['tos', options.tos],
    ['mark', options.mark]
  ];
  for (const [name, value] of optional) {
    if (value !== undefined) args.push([name, value]);
  }

  return { verb: VERB.sendProbe, args };
}
