/**
 * Tests for filename pattern search
 */
import { FakeHost } from './helpers/fake-host';
import { findFirstMatch, patternToRegExp } from '../src/utils/glob';

describe('patternToRegExp', () => {
  test('star matches any run of characters', () => {
    const regex = patternToRegExp('vncviewer-*.*.*.exe');
    expect(regex.test('vncviewer-1.13.1.exe')).toBe(true);
    expect(regex.test('vncviewer-1.13.exe')).toBe(false);
    expect(regex.test('vncviewer64-1.13.1.exe')).toBe(false);
  });

  test('dots are literal', () => {
    expect(patternToRegExp('a.exe').test('abexe')).toBe(false);
  });

  test('question mark matches one character', () => {
    const regex = patternToRegExp('viewer?.exe');
    expect(regex.test('viewer2.exe')).toBe(true);
    expect(regex.test('viewer22.exe')).toBe(false);
  });

  test('matching ignores case', () => {
    expect(patternToRegExp('tvnviewer-*.exe').test('TVNViewer-2.8.EXE')).toBe(true);
  });
});

describe('findFirstMatch', () => {
  test('prefers files directly in the root over deeper ones', () => {
    const host = new FakeHost()
      .addFile('/project/a/tvnviewer-1.exe')
      .addFile('/project/tvnviewer-2.exe');

    expect(findFirstMatch(host, '/project', 'tvnviewer-*.exe')).toBe('/project/tvnviewer-2.exe');
  });

  test('walks subdirectories in name order', () => {
    const host = new FakeHost()
      .addFile('/project/zeta/tvnviewer-1.exe')
      .addFile('/project/alpha/deep/tvnviewer-2.exe');

    expect(findFirstMatch(host, '/project', 'tvnviewer-*.exe')).toBe('/project/alpha/deep/tvnviewer-2.exe');
  });

  test('does not descend into hidden directories', () => {
    const host = new FakeHost().addFile('/project/.venv/tvnviewer-1.exe');

    expect(findFirstMatch(host, '/project', 'tvnviewer-*.exe')).toBeNull();
  });

  test('stops walking after the first match', () => {
    const host = new FakeHost()
      .addFile('/project/a/tvnviewer-1.exe')
      .addFile('/project/b/tvnviewer-2.exe');

    findFirstMatch(host, '/project', 'tvnviewer-*.exe');
    expect(host.listDirCalls).toEqual(['/project', '/project/a']);
  });

  test('an unreadable root yields no match', () => {
    const host = new FakeHost();
    expect(findFirstMatch(host, '/missing', 'tvnviewer-*.exe')).toBeNull();
  });
});
