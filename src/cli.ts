#!/usr/bin/env node
import * as dotenv from 'dotenv';
import * as readline from 'readline';
import { Command, Option } from 'commander';
import { ClientConfig, loadConfiguration, toUserAgentOptions } from '#config/index';
import { CallState, isFinished } from '#models/CallInfo';
import { UserAgentEvent } from '#models/Events';
import { formatError } from '#models/Errors';
import { RegistrationState } from '#models/Registration';
import { LevelWithSilent, Logger, createLogger } from '#utils/Logger';
import UserAgent from '#src/UserAgent';

dotenv.config();

const LEVELS: LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

interface GlobalOptions {
    config?: string[];
    logLevel?: LevelWithSilent;
    pretty?: boolean;
}

const program = new Command();
program
    .name('sipua')
    .description('SIP voice user agent: register an account and place calls')
    .version('1.0.0')
    .option('-c, --config <paths...>', 'Configuration file paths (later files override earlier ones)')
    .addOption(new Option('--log-level <level>', 'Logging level').choices(LEVELS))
    .option('--pretty', 'Human-readable logs (default on a TTY)')
    .addHelpText(
        'after',
        `
Examples:
  $ SIP_USERNAME=alice SIP_PASSWORD=secret SIP_DOMAIN=example.com sipua register
  $ sipua --config ./config/local.yaml call 1001
  $ sipua status`,
    );

function setup(): { config: ClientConfig; logger: Logger } {
    const options = program.opts<GlobalOptions>();
    const config = loadConfiguration(options.config);
    const logger = createLogger({
        level: options.logLevel ?? config.log.level,
        pretty: options.pretty ?? (config.log.pretty || process.stdout.isTTY),
    });
    return { config, logger };
}

function logEvents(agent: UserAgent, logger: Logger) {
    agent.on('event', (event: UserAgentEvent) => {
        const { type, ...details } = event;
        if (type === 'CallFailed') logger.warn(details, type);
        else logger.info(details, type);
    });
}

/** Resolves once `predicate` holds for an emitted event, or after `timeout` ms. */
function waitFor(agent: UserAgent, predicate: (event: UserAgentEvent) => boolean, timeout: number): Promise<boolean> {
    return new Promise((resolve) => {
        const timer = setTimeout(() => done(false), timeout);
        const listener = (event: UserAgentEvent) => {
            if (predicate(event)) done(true);
        };
        const done = (matched: boolean) => {
            clearTimeout(timer);
            agent.off('event', listener);
            resolve(matched);
        };
        agent.on('event', listener);
    });
}

function interrupted(): Promise<void> {
    return new Promise((resolve) => process.once('SIGINT', () => resolve()));
}

const isRegistrationSettled = (event: UserAgentEvent) =>
    event.type === 'RegistrationStateChanged' &&
    (event.state === RegistrationState.Registered || event.state === RegistrationState.Failed);

async function shutdown(agent: UserAgent, logger: Logger) {
    if (agent.unregister()) {
        await waitFor(
            agent,
            (e) => e.type === 'RegistrationStateChanged' && e.state !== RegistrationState.Unregistering,
            5000,
        );
    }
    agent.stop();
    logger.info('bye');
}

program
    .command('register')
    .description('Register the account and keep the binding fresh until Ctrl-C')
    .action(async () => {
        const { config, logger } = setup();
        const agent = new UserAgent(toUserAgentOptions(config, logger));
        logEvents(agent, logger);

        await agent.start();
        agent.register();
        await interrupted();
        await shutdown(agent, logger);
    });

program
    .command('call')
    .description('Call a number or SIP URI; press Enter or Ctrl-C to hang up')
    .argument('<target>', 'number in the account domain, user@host or SIP URI')
    .option('--no-register', 'Call without registering first')
    .action(async (target: string, options: { register: boolean }) => {
        const { config, logger } = setup();
        const agent = new UserAgent(toUserAgentOptions(config, logger));
        logEvents(agent, logger);
        await agent.start();

        if (options.register) {
            agent.register();
            await waitFor(agent, isRegistrationSettled, agent.transactionTimeout);
        }

        const callId = agent.call(target);
        const finished = waitFor(
            agent,
            (e) => e.type === 'CallStateChanged' && e.callId === callId && isFinished(e.state),
            2 ** 31 - 1,
        );

        const rl = readline.createInterface({ input: process.stdin });
        const hangup = () => {
            const state = agent.getCall(callId)?.state;
            if (state === CallState.Calling || state === CallState.Ringing) agent.cancel(callId);
            else agent.hangup(callId);
        };
        rl.on('line', hangup);
        process.once('SIGINT', hangup);

        await finished;
        rl.close();
        process.removeListener('SIGINT', hangup);

        const info = agent.getCall(callId);
        logger.info({ state: info?.state, reason: info?.reason }, 'call ended');
        await shutdown(agent, logger);
    });

program
    .command('status')
    .description('Print the effective configuration')
    .action(() => {
        const { config } = setup();
        const { password: _password, ...account } = config.account;
        console.table({
            ...account,
            protocol: config.transport.protocol,
            localPort: config.transport.localPort,
            outboundProxy: config.transport.outboundProxy ?? '-',
            expires: config.registration.expires,
            codecs: config.media.codecs.map((c) => c.name).join(', '),
        });
    });

program.parseAsync().catch((err: unknown) => {
    console.error(formatError(err));
    process.exitCode = 1;
});
