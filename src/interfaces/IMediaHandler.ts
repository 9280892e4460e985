import { LocalMedia, NegotiatedMedia } from '#models/Media';

/** Boundary to the audio layer; the engine never touches RTP itself. */
export interface IMediaHandler {
    getLocalMedia(callId: string): LocalMedia;
    start(callId: string, media: NegotiatedMedia): void;
    stop(callId: string): void;
}
