import { DocsCommand, toRepositoryPath } from '../../commands/docs.command';
import { ConfigManager } from '../../core/config.manager';
import { DocumentBuilder } from '../../core/document.builder';
import { GitService } from '../../core/git.service';
import { PushWorkflow } from '../../core/push.workflow';
import { DocumentBuildFailedError } from '../../errors/document.error';
import { RepositoryNotFoundError } from '../../errors/git.error';
import { ExternalToolMissingError } from '../../errors/tool.error';
import { createConfig, createPushSummary } from '../fixtures';

const GUIDE = {
  source: '/test/workspace/demo/docs/guide.tex',
  pdf: '/test/workspace/demo/docs/guide.pdf',
  sizeBytes: 1024,
};

describe('DocsCommand', () => {
  let loadSpy: jest.SpyInstance;
  let buildSpy: jest.SpyInstance;
  let runSpy: jest.SpyInstance;
  let gitCheckSpy: jest.SpyInstance;
  let repositoryCheckSpy: jest.SpyInstance;

  beforeEach(() => {
    gitCheckSpy = jest.spyOn(GitService.prototype, 'ensureGitAvailable').mockResolvedValue('2.43.0');
    repositoryCheckSpy = jest.spyOn(GitService.prototype, 'ensureRepository').mockResolvedValue(undefined);
    loadSpy = jest.spyOn(ConfigManager.prototype, 'load').mockResolvedValue(createConfig());
    buildSpy = jest.spyOn(DocumentBuilder.prototype, 'buildAll').mockResolvedValue([GUIDE]);
    runSpy = jest
      .spyOn(PushWorkflow.prototype, 'run')
      .mockResolvedValue(createPushSummary({ stagedFiles: ['docs/guide.pdf'] }));
  });

  afterEach(() => {
    loadSpy.mockRestore();
    buildSpy.mockRestore();
    runSpy.mockRestore();
    gitCheckSpy.mockRestore();
    repositoryCheckSpy.mockRestore();
  });

  it('should build the documents and push the generated PDFs', async () => {
    const result = await new DocsCommand('/test/workspace').execute();

    expect(buildSpy).toHaveBeenCalledWith('/test/workspace/demo');
    expect(runSpy).toHaveBeenCalledWith({
      message: 'Auto-build: Generated 1 PDF(s)',
      extraPaths: ['docs/guide.pdf'],
    });
    expect(result).toMatchObject({
      success: true,
      message: 'Built 1 PDF(s); Pushed 1 file(s) to origin/main',
      exitCode: 0,
    });
    expect(result.data?.built).toEqual([GUIDE]);
  });

  it('should use a custom commit message', async () => {
    await new DocsCommand('/test/workspace').execute({ message: 'Rebuild handbook' });

    expect(runSpy).toHaveBeenCalledWith(expect.objectContaining({ message: 'Rebuild handbook' }));
  });

  it('should stop after building when the push is disabled', async () => {
    const result = await new DocsCommand('/test/workspace').execute({ push: false });

    expect(runSpy).not.toHaveBeenCalled();
    expect(gitCheckSpy).not.toHaveBeenCalled();
    expect(result.message).toBe('Built 1 PDF(s)');
  });

  it('should not build anything when git is missing', async () => {
    gitCheckSpy.mockRejectedValue(new ExternalToolMissingError('git'));

    const result = await new DocsCommand('/test/workspace').execute();

    expect(buildSpy).not.toHaveBeenCalled();
    expect(runSpy).not.toHaveBeenCalled();
    expect(result).toMatchObject({
      success: false,
      message: 'Required program not found: git',
      exitCode: 1,
    });
  });

  it('should not build anything when the local path is not a repository', async () => {
    repositoryCheckSpy.mockRejectedValue(new RepositoryNotFoundError('Not a git repository: /test/workspace/demo'));

    const result = await new DocsCommand('/test/workspace').execute();

    expect(buildSpy).not.toHaveBeenCalled();
    expect(result).toMatchObject({ success: false, message: 'Not a git repository: /test/workspace/demo' });
  });

  it('should never push when a build fails', async () => {
    buildSpy.mockRejectedValue(new DocumentBuildFailedError('pdflatex failed on guide.tex (exit 1)', GUIDE.source));

    const result = await new DocsCommand('/test/workspace').execute();

    expect(runSpy).not.toHaveBeenCalled();
    expect(result).toMatchObject({
      success: false,
      message: 'pdflatex failed on guide.tex (exit 1)',
      exitCode: 1,
    });
  });
});

describe('toRepositoryPath', () => {
  it('should express a file relative to the repository root', () => {
    expect(toRepositoryPath('/srv/demo', '/srv/demo/docs/out/guide.pdf')).toBe('docs/out/guide.pdf');
  });
});
