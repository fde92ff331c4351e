import prompts from 'prompts';
import { Writable } from 'stream';
import { TerminalAuthInteraction } from '../src/cli/TerminalAuthInteraction';

function recordingOutput() {
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { output, text: () => chunks.join('') };
}

describe('TerminalAuthInteraction', () => {
  let interaction: TerminalAuthInteraction;

  beforeEach(() => {
    interaction = new TerminalAuthInteraction('Instagram', { output: recordingOutput().output });
  });

  describe('requestCredentials', () => {
    it('should ask for a username and a session file to import', async () => {
      prompts.inject(['test-user', '/tmp/test-user.session']);

      await expect(interaction.requestCredentials({})).resolves.toEqual({
        username: 'test-user',
        sessionFile: '/tmp/test-user.session',
      });
    });

    it('should fall back to the prefilled username and ask for a password', async () => {
      prompts.inject(['', '', 'test-secret']);

      await expect(interaction.requestCredentials({ username: 'saved-user' })).resolves.toEqual({
        username: 'saved-user',
        password: 'test-secret',
      });
    });

    it('should trim answers', async () => {
      prompts.inject(['  test-user ', ' /tmp/a.session\t']);

      await expect(interaction.requestCredentials({})).resolves.toEqual({
        username: 'test-user',
        sessionFile: '/tmp/a.session',
      });
    });

    it('should cancel without a username', async () => {
      prompts.inject(['']);

      await expect(interaction.requestCredentials({})).resolves.toBeNull();
    });

    it('should not fall back to the prefilled username when cancelled', async () => {
      prompts.inject([new Error('cancelled')]);

      await expect(interaction.requestCredentials({ username: 'saved-user' })).resolves.toBeNull();
    });

    it('should return null when the password prompt is cancelled', async () => {
      prompts.inject(['test-user', '', new Error('cancelled')]);

      await expect(interaction.requestCredentials({})).resolves.toBeNull();
    });
  });

  it('should return the verification code, or null when left blank', async () => {
    prompts.inject(['123456', '']);

    await expect(interaction.requestTwoFactorCode('test-user')).resolves.toBe('123456');
    await expect(interaction.requestTwoFactorCode('test-user')).resolves.toBeNull();
  });

  it('should return the export path, or null when left blank', async () => {
    prompts.inject(['/tmp/backup.session', '']);

    await expect(interaction.requestExportPath()).resolves.toBe('/tmp/backup.session');
    await expect(interaction.requestExportPath()).resolves.toBeNull();
  });

  it('should print errors to the output', async () => {
    const { output, text } = recordingOutput();
    const terminal = new TerminalAuthInteraction('Instagram', { output });

    terminal.reportError('Bad credentials');
    await new Promise((resolve) => setImmediate(resolve));

    expect(text()).toBe('Error: Bad credentials\n');
  });
});
