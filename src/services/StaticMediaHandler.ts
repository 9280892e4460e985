import { IMediaHandler } from '#interfaces/IMediaHandler';
import { Codec, DEFAULT_CODECS, LocalMedia, NegotiatedMedia } from '#models/Media';
import { Logger, silentLogger } from '#utils/Logger';

export interface StaticMediaOptions {
    address: string;
    port: number;
    codecs?: Codec[];
    ptime?: number;
}

/** Offers a fixed RTP endpoint and only logs session start and stop. */
class StaticMediaHandler implements IMediaHandler {
    private active = new Map<string, NegotiatedMedia>();
    private logger: Logger;

    constructor(private options: StaticMediaOptions, logger: Logger = silentLogger) {
        this.logger = logger.child({ component: 'media' });
    }

    getLocalMedia(): LocalMedia {
        return {
            address: this.options.address,
            port: this.options.port,
            codecs: this.options.codecs ?? DEFAULT_CODECS,
            ptime: this.options.ptime,
        };
    }

    start(callId: string, media: NegotiatedMedia): void {
        this.active.set(callId, media);
        this.logger.info({ callId, codec: media.codec, remote: `${media.remoteAddress}:${media.remotePort}` }, 'media started');
    }

    stop(callId: string): void {
        if (this.active.delete(callId)) this.logger.info({ callId }, 'media stopped');
    }

    isActive(callId: string): boolean {
        return this.active.has(callId);
    }
}

export default StaticMediaHandler;
