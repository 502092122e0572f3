import { runContactDemo } from './lib/contact-demo.js';

const argv = process.argv.slice(2);
const args = new Set(argv);
const debug =
  args.has('--debug') || process.env.CONTACT_DEMO_DEBUG === '1' || false;
const quiet = args.has('--quiet') || args.has('-q');
const hexArg = argv.find((arg) => arg.startsWith('--hex='));

const summary = runContactDemo({
  debug,
  inputHex: hexArg?.slice('--hex='.length),
  log: quiet ? () => undefined : undefined,
});

if (summary.status !== 'ok') {
  process.exitCode = 1;
}
