import * as fs from 'fs';
import { ManifestAccessor } from '../manifest/manifestAccessor';
import { VersionBumper } from '../versionBumper';
import { SAMPLE_MANIFEST, TestHelpers } from './utils/testHelpers';

describe('VersionBumper', () => {
  let tempDir: string;
  let manifestPath: string;
  let bumper: VersionBumper;

  const writtenVersionLine = () =>
    fs
      .readFileSync(manifestPath, 'utf-8')
      .split('\n')
      .find((line) => line.startsWith('version = '));

  beforeEach(() => {
    tempDir = TestHelpers.createTempDir();
    manifestPath = TestHelpers.writeManifest(tempDir, SAMPLE_MANIFEST.replace('"1.2.3"', '"1.2.3-rc.1+build"'));
    bumper = new VersionBumper(TestHelpers.createTestConfig(manifestPath), TestHelpers.createTestLogger());
  });

  afterEach(() => {
    TestHelpers.cleanupTempDir(tempDir);
    jest.restoreAllMocks();
  });

  describe('read', () => {
    it.each([
      ['version' as const, '1.2.3-rc.1+build'],
      ['major' as const, '1'],
      ['minor' as const, '2'],
      ['patch' as const, '3'],
      ['pre' as const, 'rc.1'],
      ['build' as const, 'build'],
    ])('should read %s', (target, expected) => {
      expect(bumper.read(target)).toBe(expected);
    });

    it('should fail with MalformedVersion when the manifest holds an invalid version', () => {
      fs.writeFileSync(manifestPath, '[package]\nversion = "1.2"\n');

      expect(() => bumper.read('major')).toThrow(expect.objectContaining({ kind: 'MalformedVersion' }));
    });
  });

  describe('bump', () => {
    it('should write a major bump and report both versions', () => {
      expect(bumper.bump({ kind: 'major' })).toEqual({ previous: '1.2.3-rc.1+build', next: '2.0.0', written: true });
      expect(writtenVersionLine()).toBe('version = "2.0.0" # managed by version-bump');
    });

    it('should keep every other line of the manifest', () => {
      bumper.bump({ kind: 'build', value: 'dev.amd64' });

      expect(fs.readFileSync(manifestPath, 'utf-8')).toBe(
        SAMPLE_MANIFEST.replace('"1.2.3"', '"1.2.3-rc.1+dev.amd64"')
      );
    });

    it('should not write anything on a dry run', () => {
      const before = fs.readFileSync(manifestPath, 'utf-8');

      expect(bumper.bump({ kind: 'patch' }, { dryRun: true })).toEqual({
        previous: '1.2.3-rc.1+build',
        next: '1.2.4',
        written: false,
      });
      expect(fs.readFileSync(manifestPath, 'utf-8')).toBe(before);
    });

    it('should replace an invalid current version with --version', () => {
      fs.writeFileSync(manifestPath, '[package]\nversion = "not-a-version"\n');

      expect(bumper.bump({ kind: 'version', value: '0.1.0' }).next).toBe('0.1.0');
      expect(fs.readFileSync(manifestPath, 'utf-8')).toBe('[package]\nversion = "0.1.0"\n');
    });

    it('should leave the manifest untouched when the new label is invalid', () => {
      const save = jest.spyOn(ManifestAccessor.prototype, 'save');

      expect(() => bumper.bump({ kind: 'pre', value: 'rc..1' })).toThrow(
        expect.objectContaining({ kind: 'MalformedPreRelease' })
      );
      expect(save).not.toHaveBeenCalled();
      expect(writtenVersionLine()).toBe('version = "1.2.3-rc.1+build" # managed by version-bump');
    });

    it('should log the operation at debug level', () => {
      bumper.bump({ kind: 'pre', value: 'beta' }, { dryRun: true });

      expect(console.error).toHaveBeenCalledWith(
        expect.stringMatching(/DEBUG Applying \{"kind":"pre","value":"beta"\} to .*Cargo\.toml$/)
      );
    });

    it('should skip debug output below debug level', () => {
      const quiet = new VersionBumper(TestHelpers.createTestConfig(manifestPath), TestHelpers.createTestLogger('warn'));
      quiet.bump({ kind: 'patch' }, { dryRun: true });

      expect(console.error).not.toHaveBeenCalled();
    });

    it('should fail with ManifestNotFound when the manifest is missing', () => {
      fs.rmSync(manifestPath);

      expect(() => bumper.bump({ kind: 'patch' })).toThrow(expect.objectContaining({ kind: 'ManifestNotFound' }));
    });
  });
});
