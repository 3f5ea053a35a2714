/**
 * ProbeClient - asynchronous probes over one shared mtr-packet process
 *
 * Any number of probes may be in flight at once; each resolves when the
 * reply carrying its token arrives, whatever the order on the wire.
 */

import {
  checkSupportCommand,
  ClientOptionsSchema,
  type ClientConfig,
  type ClientConfigInput,
  createLogger,
  InvalidArgumentError,
  isFeatureSupported,
  type Logger,
  parseOptions,
  type ProbeOptions,
  ProbeOptionsSchema,
  type ProbeResult,
  resolveExecutable,
  StateError
} from '@probewire/core';
import {
  Dispatcher,
  literalIpVersion,
  type LookupFn,
  ResolutionCache,
  type SessionStateKind,
  type SubmitOptions
} from '@probewire/runtime';
import { type ChannelFactory, ProcessChannel } from '@probewire/transport';
import { buildProbeCommand } from './probe-command.js';
import { toProbeResult } from './probe-result.js';

export type ProbeClientOptions = ClientConfigInput & {
  logger?: Logger;
  /** Replace the mtr-packet subprocess, e.g. with an in-process fake */
  channelFactory?: ChannelFactory;
  /** Replace the system resolver */
  lookup?: LookupFn;
};

export class ProbeClient {
  readonly config: ClientConfig;
  private readonly logger: Logger;
  private readonly dispatcher: Dispatcher;
  private readonly cache: ResolutionCache;

  constructor(options: ProbeClientOptions = {}) {
    const { logger, channelFactory, lookup, ...data } = options;
    this.config = parseOptions(ClientOptionsSchema, data, 'client options');
    this.logger = logger ?? createLogger({ prefix: '[probewire]' });
    this.cache = new ResolutionCache(lookup);
    this.dispatcher = new Dispatcher({
      channelFactory: channelFactory ?? (() => this.createProcessChannel()),
      syntax: this.config.syntax,
      logger: this.logger.child('dispatcher')
    });
  }

  get state(): SessionStateKind {
    return this.dispatcher.stateKind;
  }

  get isOpen(): boolean {
    return this.dispatcher.stateKind === 'open';
  }

  /**
   * Launch mtr-packet and check that it can send probes
   */
  async open(): Promise<void> {
    await this.dispatcher.open();
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }

  /**
   * Send one probe to `host` and wait for its outcome.
   *
   * The host may be a hostname or an address literal. Hostnames are resolved
   * with the requested IP version, or the version of `localIp` when only
   * that is given.
   */
  async probe(
    host: string,
    options: ProbeOptions = {},
    submitOptions: SubmitOptions = {}
  ): Promise<ProbeResult> {
    const resolved = parseOptions(ProbeOptionsSchema, options, 'probe options');

    if (!this.isOpen) {
      throw new StateError(`Cannot probe while the session is ${this.state}`);
    }

    const localVersion =
      resolved.localIp === undefined ? undefined : literalIpVersion(resolved.localIp);
    const requested = resolved.ipVersion ?? localVersion;
    if (localVersion !== undefined && requested !== localVersion) {
      throw new InvalidArgumentError(
        `localIp ${resolved.localIp} is not an IPv${requested} address`
      );
    }
    const hostVersion = literalIpVersion(host);
    if (localVersion !== undefined && hostVersion !== undefined && hostVersion !== localVersion) {
      throw new InvalidArgumentError(
        `localIp ${resolved.localIp} and target ${host} use different IP versions`
      );
    }

    const target = await this.cache.resolve(host, requested);
    const reply = await this.dispatcher.submit(
      buildProbeCommand(target, resolved),
      submitOptions
    );
    return toProbeResult(reply);
  }

  /**
   * Ask mtr-packet whether it supports a feature
   */
  async checkSupport(feature: string): Promise<boolean> {
    const reply = await this.dispatcher.submit(checkSupportCommand(feature));
    return isFeatureSupported(reply);
  }

  /**
   * Forget cached hostname resolutions; lookups already running still answer
   */
  clearResolutionCache(): void {
    this.cache.clear();
  }

  private createProcessChannel(): ProcessChannel {
    return new ProcessChannel({
      executable: resolveExecutable(this.config.executable),
      commandPrefix: this.config.commandPrefix,
      env: this.config.env,
      logger: this.logger.child('channel')
    });
  }
}
