import { expect } from 'chai';
import { describe, it } from 'mocha';
import {
  ancestry,
  baseName,
  encodePath,
  joinPath,
  normalizePath,
  parentPath,
  pathSegments
} from '../../../src/api/pathParser.js';

describe('Path Parser', () => {
  describe('pathSegments', () => {
    it('should drop empty and dot segments', () => {
      expect(pathSegments('/My Files//./reports/')).to.deep.equal(['My Files', 'reports']);
    });

    it('should resolve parent segments without climbing above the root', () => {
      expect(pathSegments('a/b/../c')).to.deep.equal(['a', 'c']);
      expect(pathSegments('../../a')).to.deep.equal(['a']);
    });

    it('should accept backslash separators', () => {
      expect(pathSegments('a\\b\\c.txt')).to.deep.equal(['a', 'b', 'c.txt']);
    });
  });

  describe('normalizePath', () => {
    it('should map the root to an empty path', () => {
      expect(normalizePath('/')).to.equal('');
      expect(normalizePath('')).to.equal('');
    });

    it('should strip leading and trailing slashes', () => {
      expect(normalizePath('/My Files/')).to.equal('My Files');
    });
  });

  it('should join parts', () => {
    expect(joinPath('My Files', '/reports/', 'q3.xlsx')).to.equal('My Files/reports/q3.xlsx');
    expect(joinPath('', 'a')).to.equal('a');
  });

  it('should split parent and base name', () => {
    expect(parentPath('My Files/reports/q3.xlsx')).to.equal('My Files/reports');
    expect(baseName('My Files/reports/q3.xlsx')).to.equal('q3.xlsx');
    expect(parentPath('top')).to.equal('');
    expect(baseName('/')).to.equal('');
  });

  it('should list ancestry shortest first', () => {
    expect(ancestry('a/b/c')).to.deep.equal(['a', 'a/b', 'a/b/c']);
    expect(ancestry('/')).to.deep.equal([]);
  });

  it('should percent-encode each segment', () => {
    expect(encodePath('My Files/a b#1.txt')).to.equal('My%20Files/a%20b%231.txt');
  });
});
