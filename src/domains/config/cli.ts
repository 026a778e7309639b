import { parseArgs } from 'util';
import { z } from 'zod';
import type { RadioParams } from '../companion/protocol';
import type { SweepRange } from '../scan/plan';

export type TransportConfig =
  | { kind: 'serial'; path: string; baudRate: number }
  | { kind: 'tcp'; host: string; port: number }
  | { kind: 'mock' };

export interface ScanConfig {
  transport: TransportConfig;
  sweep: SweepRange;
  radio: RadioParams;
  dwellMs: number;
  sampleIntervalMs: number;
  settleMs: number;
  timeoutMs: number;
  outPath: string;
  debug: boolean;
}

export type CliResult = { kind: 'help'; usage: string } | { kind: 'scan'; config: ScanConfig };

export class ConfigError extends Error {
  constructor(message: string, readonly usage: string = USAGE) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const USAGE = `Usage: noisefloor (--usb <device> | --tcp <host:port> | --mock) [options]

Transport:
  --usb <device>          Serial device (e.g. /dev/ttyUSB0)
  --tcp <host:port>       TCP target (e.g. 192.168.1.50:5000)
  --mock                  Built-in simulated device
  --baud <n>              Serial baud rate (default 115200)

Sweep:
  --start-mhz <f>         First frequency (default 915)
  --end-mhz <f>           Last frequency, inclusive (default 928)
  --step-mhz <f>          Step (default 0.125)
  --dwell-min <m>         Sampling time per frequency in minutes (default 15)
  --sample-interval <s>   Seconds between samples (default 5)
  --settle-s <s>          Seconds to wait after retuning (default 2)

Radio:
  --bw-khz <f>            Bandwidth (default 250)
  --sf <n>                Spreading factor 5-12 (default 10)
  --cr <n>                Coding rate 5-8 (default 5)

Output:
  --out <file>            CSV file (default noisefloor-<bw>-<sf>-<cr>_<timestamp>.csv)
  --timeout-s <s>         Per-request response timeout (default 10)
  --debug                 Log raw protocol frames as hex
  -h, --help              Show this help
`;

const finite = () => z.coerce.number().finite();

const CliSchema = z.object({
  usb: z.string().min(1).optional(),
  tcp: z
    .string()
    .regex(/^.+:\d+$/, 'expected HOST:PORT')
    .optional(),
  mock: z.boolean().default(false),
  baud: finite().int().positive().default(115200),
  'start-mhz': finite().positive().default(915),
  'end-mhz': finite().positive().default(928),
  'step-mhz': finite().positive().default(0.125),
  'dwell-min': finite().nonnegative().default(15),
  'sample-interval': finite().positive().default(5),
  'settle-s': finite().nonnegative().default(2),
  'bw-khz': finite().positive().default(250),
  sf: finite().int().min(5).max(12).default(10),
  cr: finite().int().min(5).max(8).default(5),
  'timeout-s': finite().positive().default(10),
  out: z.string().min(1).optional(),
  debug: z.boolean().default(false),
});

type CliValues = z.infer<typeof CliSchema>;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function timestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function defaultOutputPath(radio: RadioParams, now: Date = new Date()): string {
  return `noisefloor-${Math.trunc(radio.bandwidthKhz)}-${radio.spreadingFactor}-${radio.codingRate}_${timestamp(now)}.csv`;
}

function parseTcpTarget(target: string): { host: string; port: number } {
  const split = target.lastIndexOf(':');
  const host = target.slice(0, split).replace(/^\[(.*)\]$/, '$1');
  const port = Number(target.slice(split + 1));
  if (!host || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid --tcp target "${target}"`);
  }
  return { host, port };
}

function selectTransport(values: CliValues, env: NodeJS.ProcessEnv): TransportConfig {
  const mock = values.mock || env.NOISEFLOOR_MOCK_DEVICE === 'true';
  const selected = [values.usb !== undefined, values.tcp !== undefined, values.mock].filter(Boolean).length;
  if (selected > 1) {
    throw new ConfigError('Choose exactly one of --usb, --tcp or --mock');
  }
  if (values.usb !== undefined) return { kind: 'serial', path: values.usb, baudRate: values.baud };
  if (values.tcp !== undefined) return { kind: 'tcp', ...parseTcpTarget(values.tcp) };
  if (mock) return { kind: 'mock' };
  throw new ConfigError('A transport is required: --usb <device>, --tcp <host:port> or --mock');
}

export function parseCli(argv: string[], env: NodeJS.ProcessEnv = process.env, now: Date = new Date()): CliResult {
  let parsed: ReturnType<typeof parseRawArgs>;
  try {
    parsed = parseRawArgs(argv);
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }
  if (parsed.help) return { kind: 'help', usage: USAGE };

  const result = CliSchema.safeParse(parsed.values);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(issues.join('\n'));
  }
  const values = result.data;

  const radio: RadioParams = {
    bandwidthKhz: values['bw-khz'],
    spreadingFactor: values.sf,
    codingRate: values.cr,
  };

  return {
    kind: 'scan',
    config: {
      transport: selectTransport(values, env),
      sweep: {
        startMhz: values['start-mhz'],
        endMhz: values['end-mhz'],
        stepMhz: values['step-mhz'],
      },
      radio,
      dwellMs: values['dwell-min'] * 60_000,
      sampleIntervalMs: values['sample-interval'] * 1000,
      settleMs: values['settle-s'] * 1000,
      timeoutMs: values['timeout-s'] * 1000,
      outPath: values.out ?? defaultOutputPath(radio, now),
      debug: values.debug,
    },
  };
}

function parseRawArgs(argv: string[]) {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      usb: { type: 'string' },
      tcp: { type: 'string' },
      mock: { type: 'boolean' },
      baud: { type: 'string' },
      'start-mhz': { type: 'string' },
      'end-mhz': { type: 'string' },
      'step-mhz': { type: 'string' },
      'dwell-min': { type: 'string' },
      'sample-interval': { type: 'string' },
      'settle-s': { type: 'string' },
      'bw-khz': { type: 'string' },
      sf: { type: 'string' },
      cr: { type: 'string' },
      'timeout-s': { type: 'string' },
      out: { type: 'string' },
      debug: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });
  const { help, ...rest } = values;
  return { help: help === true, values: rest };
}
