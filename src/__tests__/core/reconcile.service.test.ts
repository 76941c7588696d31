import { ReconcileService } from '../../core/reconcile.service';
import { FileSystemService } from '../../core/filesystem.service';
import { SymlinkService } from '../../core/symlink.service';
import { FileSystemError } from '../../errors/filesystem.error';
import * as path from 'path';
import * as fs from 'fs-extra';
import * as os from 'os';

describe('ReconcileService', () => {
  let tempDir: string;
  let homeDir: string;
  let repositoryDir: string;
  let fileSystem: FileSystemService;
  let symlinkService: SymlinkService;
  let reconciler: ReconcileService;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  const home = (item: string): string => path.join(homeDir, item);
  const repo = (item: string): string => path.join(repositoryDir, item);

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'gotfiles-reconcile-'));
    homeDir = path.join(tempDir, 'home');
    repositoryDir = path.join(tempDir, 'work', 'dotfiles');
    await fs.ensureDir(homeDir);
    await fs.ensureDir(repositoryDir);

    fileSystem = new FileSystemService();
    symlinkService = new SymlinkService(fileSystem);
    reconciler = new ReconcileService(homeDir, repositoryDir, fileSystem, symlinkService);

    logSpy = jest.spyOn(console, 'log').mockImplementation();
    errorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(async () => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    await fs.remove(tempDir);
  });

  describe('processPath', () => {
    it('should skip a source that is already a symlink', async () => {
      const elsewhere = path.join(tempDir, 'elsewhere.zshrc');
      await fs.writeFile(elsewhere, 'export ZSH=1');
      await fs.symlink(elsewhere, home('.zshrc'));

      const report = await reconciler.processPath('.zshrc', { isSync: false });

      expect(report).toMatchObject({
        state: 'symlink',
        copied: false,
        removed: false,
        linked: false,
        errors: [],
      });
      expect(await fs.readlink(home('.zshrc'))).toBe(elsewhere);
      expect(await fs.pathExists(repo('.zshrc'))).toBe(false);
      expect(logSpy).toHaveBeenCalledWith('Skipping backup for .zshrc as it is already a symlink');
    });

    it('should move a regular file into the repository and link it back', async () => {
      const bytes = Buffer.from('alias ll="ls -la"\n\u0000binaryÿ');
      await fs.writeFile(home('.bashrc'), bytes);

      const report = await reconciler.processPath('.bashrc', { isSync: false });

      expect(report).toMatchObject({
        state: 'file',
        copied: true,
        removed: true,
        linked: true,
        errors: [],
      });
      expect((await fs.readFile(repo('.bashrc'))).equals(bytes)).toBe(true);
      expect((await fs.lstat(home('.bashrc'))).isSymbolicLink()).toBe(true);
      expect(await fs.readlink(home('.bashrc'))).toBe(repo('.bashrc'));
      expect(logSpy).toHaveBeenCalledWith('Copied file .bashrc to repository');
    });

    it('should word the log differently when syncing', async () => {
      await fs.writeFile(home('.bashrc'), 'new');
      await fs.writeFile(repo('.bashrc'), 'old');

      const report = await reconciler.processPath('.bashrc', { isSync: true });

      expect(report.copied).toBe(true);
      expect(await fs.readFile(repo('.bashrc'), 'utf8')).toBe('new');
      expect(logSpy).toHaveBeenCalledWith('Updated file .bashrc in repository');
    });

    it('should move a directory tree and remove the original', async () => {
      await fs.ensureDir(home('.config/nvim/lua'));
      await fs.writeFile(home('.config/nvim/init.lua'), 'vim.o.number = true');
      await fs.writeFile(home('.config/nvim/lua/keys.lua'), 'return {}');
      await fs.writeFile(home('.config/other.conf'), 'untouched');

      const report = await reconciler.processPath('.config/nvim', { isSync: false });

      expect(report).toMatchObject({ state: 'directory', copied: true, removed: true, linked: true });
      expect(await fs.readFile(repo('.config/nvim/init.lua'), 'utf8')).toBe('vim.o.number = true');
      expect(await fs.readFile(repo('.config/nvim/lua/keys.lua'), 'utf8')).toBe('return {}');
      expect((await fs.lstat(home('.config/nvim'))).isSymbolicLink()).toBe(true);
      expect(await fs.readlink(home('.config/nvim'))).toBe(repo('.config/nvim'));
      expect(await fs.readFile(home('.config/other.conf'), 'utf8')).toBe('untouched');
      expect(logSpy).toHaveBeenCalledWith('Copied directory .config/nvim to repository');
    });

    it('should link a missing source to an existing backup', async () => {
      await fs.writeFile(repo('.vimrc'), 'set nu');

      const report = await reconciler.processPath('.vimrc', { isSync: true });

      expect(report).toMatchObject({ state: 'missing', copied: false, linked: true, errors: [] });
      expect(await fs.readlink(home('.vimrc'))).toBe(repo('.vimrc'));
      expect(await fs.readFile(home('.vimrc'), 'utf8')).toBe('set nu');
    });

    it('should create missing parent directories before linking', async () => {
      await fs.ensureDir(repo('.config/git'));
      await fs.writeFile(repo('.config/git/config'), '[core]');

      const report = await reconciler.processPath('.config/git/config', { isSync: true });

      expect(report.linked).toBe(true);
      expect(await fs.readlink(home('.config/git/config'))).toBe(repo('.config/git/config'));
    });

    it('should leave an item alone when neither source nor backup exists', async () => {
      const report = await reconciler.processPath('.missing', { isSync: false });

      expect(report).toMatchObject({ state: 'missing', copied: false, linked: false, errors: [] });
      expect(await fs.pathExists(home('.missing'))).toBe(false);
      expect(errorSpy).toHaveBeenCalledWith('⚠ Warn:', '.missing does not exist in home');
      expect(errorSpy).toHaveBeenCalledWith('⚠ Warn:', 'No backup for .missing found in repository');
    });

    it('should record an inaccessible source and continue to the symlink step', async () => {
      await fs.writeFile(home('notadir'), 'plain file');

      const report = await reconciler.processPath('notadir/child', { isSync: false });

      expect(report.state).toBe('inaccessible');
      expect(report.errors).toHaveLength(1);
      expect(report.errors[0]).toContain('Error accessing notadir/child: Failed to inspect');
      expect(report.linked).toBe(false);
    });

    it('should link after an access error once the source turns out to be absent', async () => {
      await fs.writeFile(repo('.netrc'), 'machine example');
      jest
        .spyOn(fileSystem, 'getLinkStats')
        .mockRejectedValueOnce(new FileSystemError('Failed to inspect .netrc', 'EACCES'));

      const report = await reconciler.processPath('.netrc', { isSync: false });

      expect(report.state).toBe('inaccessible');
      expect(report.errors).toEqual(['Error accessing .netrc: Failed to inspect .netrc: EACCES']);
      expect(report.linked).toBe(true);
    });

    it('should keep the original when the copy fails', async () => {
      await fs.writeFile(home('.bashrc'), 'keep');
      jest
        .spyOn(fileSystem, 'copyPath')
        .mockRejectedValueOnce(new FileSystemError('Failed to copy', 'ENOSPC'));

      const report = await reconciler.processPath('.bashrc', { isSync: false });

      expect(report).toMatchObject({ copied: false, removed: false, linked: false });
      expect(report.errors).toEqual(['Error copying file .bashrc: Failed to copy: ENOSPC']);
      expect((await fs.lstat(home('.bashrc'))).isFile()).toBe(true);
      expect(await fs.readFile(home('.bashrc'), 'utf8')).toBe('keep');
    });

    it('should not link while the original could not be removed', async () => {
      await fs.writeFile(home('.profile'), 'PATH=$PATH');
      jest
        .spyOn(fileSystem, 'remove')
        .mockRejectedValueOnce(new FileSystemError('Failed to remove', 'EBUSY'));

      const report = await reconciler.processPath('.profile', { isSync: false });

      expect(report).toMatchObject({ copied: true, removed: false, linked: false });
      expect(report.errors).toEqual(['Error removing original file .profile: Failed to remove: EBUSY']);
      expect(await fs.readFile(repo('.profile'), 'utf8')).toBe('PATH=$PATH');
    });

    it('should report a failed symlink without throwing', async () => {
      await fs.writeFile(home('.inputrc'), 'set editing-mode vi');
      jest
        .spyOn(symlinkService, 'create')
        .mockRejectedValueOnce(new FileSystemError('Failed to create symlink', 'EPERM'));

      const report = await reconciler.processPath('.inputrc', { isSync: false });

      expect(report).toMatchObject({ copied: true, removed: true, linked: false });
      expect(report.errors).toEqual([
        'Error creating symlink for .inputrc: Failed to create symlink: EPERM',
      ]);
      expect(await fs.pathExists(home('.inputrc'))).toBe(false);
      expect(await fs.readFile(repo('.inputrc'), 'utf8')).toBe('set editing-mode vi');
    });

    it('should change nothing on a dry run', async () => {
      await fs.writeFile(home('.bashrc'), 'x');
      await fs.writeFile(repo('.vimrc'), 'y');

      const fileReport = await reconciler.processPath('.bashrc', { isSync: false, dryRun: true });
      const missingReport = await reconciler.processPath('.vimrc', { isSync: false, dryRun: true });

      expect(fileReport).toMatchObject({ state: 'file', copied: false, linked: false });
      expect(missingReport).toMatchObject({ state: 'missing', linked: false });
      expect((await fs.lstat(home('.bashrc'))).isFile()).toBe(true);
      expect(await fs.pathExists(repo('.bashrc'))).toBe(false);
      expect(await fs.pathExists(home('.vimrc'))).toBe(false);
      expect(logSpy).toHaveBeenCalledWith(
        '[dry run] Would copy file .bashrc and replace it with a symlink',
      );
      expect(logSpy).toHaveBeenCalledWith('[dry run] Would create symlink for .vimrc');
    });
  });

  describe('processAll', () => {
    it('should process every item in order and summarize', async () => {
      await fs.writeFile(home('.bashrc'), 'a');
      await fs.writeFile(repo('.vimrc'), 'b');
      await fs.writeFile(path.join(tempDir, 'target'), 'c');
      await fs.symlink(path.join(tempDir, 'target'), home('.zshrc'));
      const processSpy = jest.spyOn(reconciler, 'processPath');

      const summary = await reconciler.processAll(['.bashrc', '.vimrc', '.zshrc', '.nothing'], {
        isSync: false,
      });

      expect(processSpy.mock.calls.map(([item]) => item)).toEqual([
        '.bashrc',
        '.vimrc',
        '.zshrc',
        '.nothing',
      ]);
      expect(summary.reports.map(report => report.state)).toEqual([
        'file',
        'missing',
        'symlink',
        'missing',
      ]);
      expect(summary).toMatchObject({ copied: 1, linked: 2, skipped: 1, failed: 0 });
    });

    it('should keep going after an item fails', async () => {
      await fs.writeFile(home('.first'), '1');
      await fs.writeFile(home('.second'), '2');
      jest
        .spyOn(symlinkService, 'create')
        .mockRejectedValueOnce(new FileSystemError('Failed to create symlink', 'EPERM'));

      const summary = await reconciler.processAll(['.first', '.second'], { isSync: false });

      expect(summary.reports[0]?.linked).toBe(false);
      expect(summary.reports[1]?.linked).toBe(true);
      expect(summary).toMatchObject({ copied: 2, linked: 1, failed: 1 });
    });

    it('should be idempotent across runs', async () => {
      await fs.writeFile(home('.bashrc'), 'a');
      await fs.ensureDir(home('.config/fish'));
      await fs.writeFile(home('.config/fish/config.fish'), 'set -x A 1');
      const items = ['.bashrc', '.config/fish'];

      const first = await reconciler.processAll(items, { isSync: false });
      const copySpy = jest.spyOn(fileSystem, 'copyPath');
      const second = await reconciler.processAll(items, { isSync: false });

      expect(first).toMatchObject({ copied: 2, linked: 2, skipped: 0 });
      expect(second).toMatchObject({ copied: 0, linked: 0, skipped: 2 });
      expect(copySpy).not.toHaveBeenCalled();
    });
  });

  describe('inspect', () => {
    it('should classify each kind of item', async () => {
      await fs.writeFile(repo('.linked'), 'x');
      await fs.symlink(repo('.linked'), home('.linked'));
      await fs.writeFile(path.join(tempDir, 'other'), 'x');
      await fs.symlink(path.join(tempDir, 'other'), home('.foreign'));
      await fs.writeFile(home('.pending'), 'x');
      await fs.writeFile(repo('.restorable'), 'x');

      const statuses = await Promise.all(
        ['.linked', '.foreign', '.pending', '.restorable', '.missing'].map(item =>
          reconciler.inspect(item),
        ),
      );

      expect(statuses.map(status => status.status)).toEqual([
        'linked',
        'foreign-link',
        'pending',
        'restorable',
        'missing',
      ]);
    });
  });
});
