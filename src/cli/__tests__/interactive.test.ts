import { CliHarness } from '../../testing/cliHarness';
import {
  buildCombinedCommand,
  buildOptionsCommand,
  buildTwapCommand,
  buildVolatilityCommand,
  runInteractiveMode
} from '../commands/interactive';
import { Prompter } from '../lib/prompter';

/**
 * Answers prompts from a fixed script; `undefined` takes the default
 */
class ScriptedPrompter implements Prompter {
  closed = false;
  questions: string[] = [];
  /** Lower bound each numeric question was asked with */
  bounds: Record<string, string> = {};

  constructor(private answers: Array<number | boolean | undefined>) {}

  async select(message: string, _choices: readonly string[], defaultIndex: number = 0): Promise<number> {
    return this.next(message, defaultIndex);
  }

  async integer(message: string, defaultValue: number, minimum: number = 0): Promise<number> {
    this.bounds[message] = `>= ${minimum}`;
    return this.next(message, defaultValue);
  }

  async number(message: string, defaultValue: number, positive: boolean = false): Promise<number> {
    this.bounds[message] = positive ? '> 0' : '>= 0';
    return this.next(message, defaultValue);
  }

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    this.questions.push(message);
    const answer = this.answers.shift();
    return typeof answer === 'boolean' ? answer : defaultValue;
  }

  close(): void {
    this.closed = true;
  }

  private next(message: string, defaultValue: number): number {
    this.questions.push(message);
    const answer = this.answers.shift();
    return typeof answer === 'number' ? answer : defaultValue;
  }
}

describe('interactive mode', () => {
  const cli = new CliHarness();

  beforeEach(() => cli.setup());
  afterEach(() => cli.teardown());

  describe('command builders', () => {
    test('should build the volatility command from defaults', async () => {
      const prompter = new ScriptedPrompter([undefined, undefined, undefined, undefined, undefined]);

      await expect(buildVolatilityCommand(prompter)).resolves.toEqual([
        'vector-plus volatility create-config',
        '--baseline-volatility 300',
        '--current-volatility 350',
        '--max-execution-size 5',
        '--min-execution-size 0.1'
      ]);
      expect(prompter.questions).toEqual([
        'Baseline volatility (basis points)',
        'Current volatility (basis points)',
        'Maximum execution size (ETH)',
        'Minimum execution size (ETH)',
        'Enable conservative mode?'
      ]);
    });

    test('should add the conservative flag when confirmed', async () => {
      const parts = await buildVolatilityCommand(new ScriptedPrompter([250, 400, 3, 0.5, true]));

      expect(parts.slice(1)).toEqual([
        '--baseline-volatility 250',
        '--current-volatility 400',
        '--max-execution-size 3',
        '--min-execution-size 0.5',
        '--conservative-mode'
      ]);
    });

    test('should build the TWAP command', async () => {
      await expect(buildTwapCommand(new ScriptedPrompter([undefined, undefined, undefined]))).resolves.toEqual([
        'vector-plus twap create-config',
        '--duration 120',
        '--intervals 12',
        '--randomize'
      ]);
      await expect(buildTwapCommand(new ScriptedPrompter([60, 6, false]))).resolves.toEqual([
        'vector-plus twap create-config',
        '--duration 60',
        '--intervals 6'
      ]);
    });

    test('should build a put option command', async () => {
      await expect(buildOptionsCommand(new ScriptedPrompter([1, 1900, 72, 35]))).resolves.toEqual([
        'vector-plus options create-put',
        '--strike-price 1900',
        '--expiration-hours 72',
        '--premium 35'
      ]);
    });

    test('should build the combined command', async () => {
      await expect(buildCombinedCommand(new ScriptedPrompter([]))).resolves.toEqual([
        'vector-plus combined create',
        '--twap-duration 180',
        '--twap-intervals 18',
        '--volatility-threshold 600'
      ]);
    });

    test('should ask with the bounds each command option accepts', async () => {
      const prompter = new ScriptedPrompter([]);

      await buildVolatilityCommand(prompter);
      await buildTwapCommand(prompter);
      await buildOptionsCommand(prompter);
      await buildCombinedCommand(prompter);

      expect(prompter.bounds).toEqual({
        'Baseline volatility (basis points)': '>= 1',
        'Current volatility (basis points)': '>= 0',
        'Maximum execution size (ETH)': '>= 0',
        'Minimum execution size (ETH)': '>= 0',
        'Execution duration (minutes)': '>= 1',
        'Number of intervals': '>= 1',
        'Strike price (USDC)': '> 0',
        'Expiration (hours)': '>= 1',
        'Premium (USDC)': '>= 0',
        'TWAP duration (minutes)': '>= 1',
        'TWAP intervals': '>= 1',
        'Volatility threshold (basis points)': '>= 1'
      });
    });
  });

  test('should print the command for the chosen strategy', async () => {
    await runInteractiveMode(new ScriptedPrompter([0]));

    expect(cli.lines).toEqual([
      '🎯 Vector Plus Interactive Mode',
      '',
      '🌊 Building Volatility Strategy',
      '',
      '',
      '✅ Volatility strategy configured!',
      '📁 Run: vector-plus volatility create-config \\',
      '       --baseline-volatility 300 \\',
      '       --current-volatility 350 \\',
      '       --max-execution-size 5 \\',
      '       --min-execution-size 0.1'
    ]);
  });

  test('should point at config commands', async () => {
    await runInteractiveMode(new ScriptedPrompter([4, 1]));

    expect(cli.lines).toContain('📋 Run: vector-plus config show');
    expect(cli.lines).not.toContain('👋 Goodbye!');
  });

  test('should say goodbye on exit', async () => {
    await runInteractiveMode(new ScriptedPrompter([5]));

    expect(cli.lines[cli.lines.length - 1]).toBe('👋 Goodbye!');
  });

  test('should close the prompter when run as a command', async () => {
    const prompter = new ScriptedPrompter([3]);

    await cli.run(['interactive'], { createPrompter: () => prompter });

    expect(prompter.closed).toBe(true);
    expect(cli.lines).toContain('✅ Combined strategy configured!');
    expect(cli.lines).toContain('📁 Run: vector-plus combined create \\');
  });
});
