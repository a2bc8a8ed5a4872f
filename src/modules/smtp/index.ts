import * as net from 'net';
import { Config } from '../../config';
import { SmtpProbeResponse, SmtpStage, SmtpTransport } from '../../types';
import { CapabilityError, errnoOf, errorMessage, SmtpUnsupportedError, TransientNetworkError } from '../../utils/errors';
import { Normalizer } from '../normalizer';

const UNREACHABLE_CODES = new Set(['ENETUNREACH', 'EHOSTUNREACH', 'EACCES']);

type SmtpReply = { code: number; lines: string[] };

/**
 * Line reader for SMTP replies. Multiline replies ("250-...") are
 * accumulated until the final line ("250 ...").
 */
export class ReplyParser {
    private buffer = '';
    private pending: string[] = [];

    push(chunk: string): SmtpReply[] {
        this.buffer += chunk;
        const replies: SmtpReply[] = [];
        let idx: number;
        while ((idx = this.buffer.indexOf('\n')) >= 0) {
            const line = this.buffer.slice(0, idx).replace(/\r$/, '');
            this.buffer = this.buffer.slice(idx + 1);
            const match = /^(\d{3})([ -]?)(.*)$/.exec(line);
            if (!match) continue;
            this.pending.push(match[3]);
            if (match[2] === '-') continue;
            replies.push({ code: Number(match[1]), lines: this.pending });
            this.pending = [];
        }
        return replies;
    }
}

/**
 * Mailbox probe over a raw SMTP session: greeting, EHLO (HELO fallback),
 * MAIL FROM, RCPT TO, QUIT. DATA is never sent.
 *
 * Resolves with the reply that decided the session. Rejects only when no
 * decision could be read (connection failure, timeout) or when the address
 * cannot be expressed to this server.
 */
export class NetSmtpTransport implements SmtpTransport {
    constructor(private readonly config: Config['smtp']) { }

    probe(host: string, localPart: string, domain: string): Promise<SmtpProbeResponse> {
        const { port, timeout_ms, helo_name, mail_from } = this.config;
        const needsUtf8 = !Normalizer.isAscii(localPart);
        const recipient = `${localPart}@${domain.toLowerCase()}`;

        return new Promise((resolve, reject) => {
            const socket = net.createConnection({ host, port });
            const parser = new ReplyParser();
            let stage: SmtpStage = 'greeting';
            let heloFallback = false;
            let settled = false;

            const finish = (quit: boolean, settle: () => void) => {
                if (settled) return;
                settled = true;
                clearTimeout(deadline);
                if (quit) {
                    socket.end('QUIT\r\n');
                } else {
                    socket.destroy();
                }
                settle();
            };
            const answer = (reply: SmtpReply) =>
                finish(true, () => resolve({ code: reply.code, message: reply.lines.join(' ').trim(), stage }));
            const fail = (error: Error) => finish(false, () => reject(error));

            // Overall budget for the whole dialogue on top of the idle timeout
            const deadline = setTimeout(() => {
                fail(new TransientNetworkError(`SMTP session with ${host} exceeded ${timeout_ms * 3}ms`, 'ETIMEDOUT'));
            }, timeout_ms * 3);

            const send = (command: string) => {
                socket.write(`${command}\r\n`);
            };

            const onReply = (reply: SmtpReply) => {
                switch (stage) {
                    case 'greeting':
                        if (reply.code !== 220) return answer(reply);
                        stage = 'helo';
                        return send(`EHLO ${helo_name}`);

                    case 'helo': {
                        if (reply.code >= 500 && !heloFallback) {
                            heloFallback = true;
                            return send(`HELO ${helo_name}`);
                        }
                        if (reply.code !== 250) return answer(reply);
                        const smtpUtf8 = !heloFallback && reply.lines.some((l) => /^SMTPUTF8\b/i.test(l.trim()));
                        if (needsUtf8 && !smtpUtf8) {
                            return finish(true, () => reject(new SmtpUnsupportedError(
                                `${host} does not advertise SMTPUTF8, cannot probe ${recipient}`
                            )));
                        }
                        stage = 'mail';
                        return send(`MAIL FROM:<${mail_from}>${needsUtf8 ? ' SMTPUTF8' : ''}`);
                    }

                    case 'mail':
                        if (reply.code < 200 || reply.code >= 300) return answer(reply);
                        stage = 'rcpt';
                        return send(`RCPT TO:<${recipient}>`);

                    case 'rcpt':
                        return answer(reply);
                }
            };

            socket.setEncoding('utf8');
            socket.setTimeout(timeout_ms);

            socket.on('data', (chunk: Buffer | string) => {
                for (const reply of parser.push(chunk.toString())) {
                    if (settled) return;
                    onReply(reply);
                }
            });

            socket.on('timeout', () => {
                fail(new TransientNetworkError(`SMTP ${host} idle for ${timeout_ms}ms at ${stage}`, 'ETIMEDOUT'));
            });

            socket.on('error', (error) => {
                const code = errnoOf(error);
                if (code && UNREACHABLE_CODES.has(code)) {
                    fail(new CapabilityError('smtp', `Cannot reach ${host}:${port}: ${code}`, error));
                    return;
                }
                fail(new TransientNetworkError(`SMTP ${host}:${port} ${errorMessage(error)}`, code));
            });

            socket.on('close', () => {
                fail(new TransientNetworkError(`SMTP ${host} closed the connection at ${stage}`, 'ECONNRESET'));
            });
        });
    }
}
