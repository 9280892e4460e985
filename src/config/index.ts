import type { UserAgentOptions } from '#src/UserAgent';
import StaticMediaHandler from '#services/StaticMediaHandler';
import { Logger, silentLogger } from '#utils/Logger';
import { loadConfiguration } from './convict';
import { ClientConfig } from './types';

export * from './types';
export { loadConfiguration };

/** Maps a loaded configuration onto user agent options. */
export function toUserAgentOptions(config: ClientConfig, logger: Logger = silentLogger): UserAgentOptions {
    const { transport, media } = config;

    return {
        account: config.account,
        protocol: transport.protocol,
        localAddress: transport.localAddress,
        localPort: transport.localPort,
        publicAddress: transport.publicAddress,
        outboundProxy: transport.outboundProxy,
        timers: { ...config.timers },
        registration: { ...config.registration, retry: { ...config.registration.retry } },
        call: { ...config.call },
        media: new StaticMediaHandler(
            { address: media.rtpAddress, port: media.rtpPort, codecs: media.codecs.map((c) => ({ ...c })), ptime: media.ptime },
            logger,
        ),
        logger,
    };
}
