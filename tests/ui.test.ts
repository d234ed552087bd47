import { describe, it, expect } from 'vitest';
import { countLines, editInEditor } from '../src/ui.js';

describe('countLines', () => {
  it('should count wrapped rows', () => {
    expect(countLines('abc\ndefgh', 4)).toBe(3);
  });

  it('should count an empty line as one row', () => {
    expect(countLines('\n', 80)).toBe(2);
    expect(countLines('', 80)).toBe(0);
  });
});

describe('editInEditor', () => {
  it('should return the edited message without comment lines', async () => {
    const edited = await editInEditor("sed -i 's/feat: add login/fix: repair login/'", 'feat: add login');
    expect(edited).toBe('fix: repair login');
  });

  it('should return the message unchanged when the editor saves as is', async () => {
    expect(await editInEditor('true', 'feat: add login\n\nbody line')).toBe('feat: add login\n\nbody line');
  });

  it('should return undefined when the editor fails', async () => {
    expect(await editInEditor('false', 'feat: add login')).toBeUndefined();
  });

  it('should return undefined when the file is emptied', async () => {
    expect(await editInEditor("sed -i '/^[^#]/d'", 'feat: add login')).toBeUndefined();
  });
});
