import * as dgram from 'dgram';
import * as net from 'net';
import { EventEmitter } from 'events';
import { Buffer } from 'buffer';
import { TransportError } from './SnmpError';

/**
 * Where and how persistently to send one request.
 */
export interface TransportTarget {
    /** Agent IP address or hostname */
    host: string;
    /** Agent UDP port (usually 161) */
    port: number;
    /** Milliseconds to wait for a response after each send */
    timeout: number;
    /** Extra sends after the first one before giving up */
    retries: number;
}

/**
 * Datagram exchange primitive the request engine is built on.
 * Implementations resolve with the first datagram `accept` returns true for,
 * and reject with `TransportError` once every try has timed out.
 */
export interface SnmpTransport {
    exchange(target: TransportTarget, request: Buffer, accept: (response: Buffer) => boolean): Promise<Buffer>;
    close(): void;
}

/**
 * True when a datagram came from the agent's port, and from its address when
 * the target is an IP literal (hostnames are only checked by port).
 */
function isFromTarget(from: dgram.RemoteInfo, target: TransportTarget): boolean {
    if (from.port !== target.port) return false;
    if (net.isIP(target.host) === 0) return true;
    return from.address.toLowerCase() === target.host.toLowerCase();
}

export declare interface UdpClient {
    on(event: 'send', listener: (attempt: number, target: TransportTarget) => void): this;
    on(event: 'discard', listener: (datagram: Buffer, from: dgram.RemoteInfo) => void): this;
}

/**
 * Low-level UDP client.
 * Responsibilities:
 * 1. Transport Layer: picks udp4/udp6 from the target address.
 * 2. Reliability: retransmits the same datagram until a response or the retry budget runs out.
 * 3. Matching: datagrams from the target go to the caller's `accept` predicate; everything else is discarded.
 *
 * A socket is opened per exchange and always closed when the exchange settles.
 */
export class UdpClient extends EventEmitter implements SnmpTransport {
    private readonly sockets = new Set<dgram.Socket>();

    public exchange(target: TransportTarget, request: Buffer, accept: (response: Buffer) => boolean): Promise<Buffer> {
        return new Promise((resolve, reject) => {
            const socket = dgram.createSocket(net.isIPv6(target.host) ? 'udp6' : 'udp4');
            this.sockets.add(socket);

            let attempt = 0;
            let timer: NodeJS.Timeout | null = null;
            let settled = false;

            const finish = (error: Error | null, response?: Buffer) => {
                if (settled) return;
                settled = true;

                if (timer) clearTimeout(timer);
                this.sockets.delete(socket);
                socket.removeAllListeners();
                socket.close();

                if (error) {
                    reject(error);
                } else if (response) {
                    resolve(response);
                }
            };

            const send = () => {
                attempt++;
                this.emit('send', attempt, target);

                socket.send(request, target.port, target.host, (err) => {
                    if (err) {
                        finish(new TransportError('socketError', err.message));
                    }
                });

                timer = setTimeout(() => {
                    if (attempt <= target.retries) {
                        send();
                    } else {
                        finish(new TransportError(
                            'requestTimedOut',
                            `no response from ${target.host}:${target.port} after ${attempt} attempt(s)`
                        ));
                    }
                }, target.timeout);
            };

            socket.on('message', (msg: Buffer, rinfo: dgram.RemoteInfo) => {
                if (isFromTarget(rinfo, target) && accept(msg)) {
                    finish(null, msg);
                } else {
                    this.emit('discard', msg, rinfo);
                }
            });

            socket.on('error', (err: Error) => {
                finish(new TransportError('socketError', err.message));
            });

            send();
        });
    }

    /**
     * Abandons every exchange still in flight.
     */
    public close(): void {
        for (const socket of this.sockets) {
            socket.emit('error', new Error('Transport closed'));
        }
        this.sockets.clear();
    }
}
