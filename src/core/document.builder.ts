import * as path from 'path';
import { DocsSettings } from '../types/config.types';
import { CommandRunner } from './command.runner';
import { FileSystemService } from './filesystem.service';
import { DocumentBuildFailedError } from '../errors/document.error';
import { ExternalToolFailedError } from '../errors/tool.error';
import { extractLatexErrors, formatMegabytes } from '../utils/latex.parsers';
import { logger } from '../utils/logger.service';

/**
 * Intermediate files pdflatex leaves next to the source
 */
const AUX_EXTENSIONS = ['.aux', '.log', '.out', '.toc'] as const;

export interface BuiltDocument {
  source: string;
  pdf: string;
  sizeBytes: number;
}

/**
 * Compiles .tex sources into PDFs with an external LaTeX compiler
 */
export class DocumentBuilder {
  private readonly settings: DocsSettings;
  private readonly runner: CommandRunner;
  private readonly fileSystem: FileSystemService;

  constructor(settings: DocsSettings, runner: CommandRunner, fileSystem?: FileSystemService) {
    this.settings = settings;
    this.runner = runner;
    this.fileSystem = fileSystem || new FileSystemService();
  }

  /**
   * .tex files below the docs directory of `repositoryPath`, sorted
   */
  public async findSources(repositoryPath: string): Promise<string[]> {
    const docsDir = path.resolve(repositoryPath, this.settings.directory);
    if (!(await this.fileSystem.isDirectory(docsDir))) {
      throw new DocumentBuildFailedError(`Docs directory not found: ${docsDir}`);
    }
    return await this.fileSystem.findFiles(docsDir, '.tex');
  }

  /**
   * Build every source, stopping at the first failure
   */
  public async buildAll(repositoryPath: string): Promise<BuiltDocument[]> {
    const sources = await this.findSources(repositoryPath);
    if (sources.length === 0) {
      throw new DocumentBuildFailedError('No .tex files found');
    }

    logger.info(`Found ${sources.length} .tex file(s)`);
    const built: BuiltDocument[] = [];
    for (const source of sources) {
      built.push(await this.build(source));
    }
    return built;
  }

  public async build(source: string): Promise<BuiltDocument> {
    const directory = path.dirname(source);
    const fileName = path.basename(source);
    logger.info(`Building: ${fileName}`);

    for (let pass = 1; pass <= this.settings.passes; pass++) {
      logger.debug(`  Run ${pass}/${this.settings.passes}`);
      try {
        await this.runner.run(this.settings.compiler, ['-interaction=nonstopmode', '-halt-on-error', fileName], {
          cwd: directory,
        });
      } catch (error) {
        if (error instanceof ExternalToolFailedError) {
          throw new DocumentBuildFailedError(
            `${this.settings.compiler} failed on ${fileName} (exit ${error.exitCode ?? 'unknown'})`,
            source,
            extractLatexErrors(error.stderr),
          );
        }
        throw error;
      }
    }

    await this.removeAuxFiles(source);

    const pdf = replaceExtension(source, '.pdf');
    if (!(await this.fileSystem.pathExists(pdf))) {
      throw new DocumentBuildFailedError(`PDF not created for ${fileName}`, source);
    }

    const sizeBytes = await this.fileSystem.getSize(pdf);
    logger.info(`  ✓ Built: ${path.basename(pdf)} (${formatMegabytes(sizeBytes)})`);
    return { source, pdf, sizeBytes };
  }

  private async removeAuxFiles(source: string): Promise<void> {
    for (const extension of AUX_EXTENSIONS) {
      const auxFile = replaceExtension(source, extension);
      if (await this.fileSystem.pathExists(auxFile)) {
        await this.fileSystem.remove(auxFile);
      }
    }
  }
}

function replaceExtension(filePath: string, extension: string): string {
  return path.join(path.dirname(filePath), `${path.basename(filePath, path.extname(filePath))}${extension}`);
}
