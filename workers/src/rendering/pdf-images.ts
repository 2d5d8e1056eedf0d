/**
 * PDF Page Rendering
 *
 * Renders the first pages of a PDF to PNG with poppler's `pdftoppm` and
 * returns them base64-encoded, in page order, for the visual-judgment call.
 * pdf-lib reads the document first so unreadable files fail before any
 * external process is started.
 */

import { execFile } from "child_process";
import { promisify } from "util";
import { mkdtemp, readFile, readdir, rm } from "fs/promises";
import { tmpdir } from "os";
import { basename, join } from "path";
import { PDFDocument } from "pdf-lib";
import type { Logger } from "../logger.js";
import { createConsoleLogger } from "../logger.js";
import { errorMessage } from "../errors.js";
import { isNotFoundError } from "../utils/guards.js";
import type { PageImage } from "../types.js";

const execFileAsync = promisify(execFile);

/** Hard cap on rendered pages, whatever the caller asks for */
export const MAX_RENDER_PAGES = 100;

export interface PageRenderer {
  render(filePath: string, maxPages: number): Promise<PageImage[]>;
}

export interface PdftoppmRendererOptions {
  /** Default: 200 */
  dpi?: number;
  logger?: Logger;
}

const PAGE_FILE = /-(\d+)\.png$/;

function pageIndexOf(fileName: string): number {
  const match = PAGE_FILE.exec(fileName);
  return match ? Number.parseInt(match[1], 10) : Number.MAX_SAFE_INTEGER;
}

export class PdftoppmRenderer implements PageRenderer {
  private readonly dpi: number;
  private readonly logger: Logger;

  constructor(options: PdftoppmRendererOptions = {}) {
    this.dpi = options.dpi ?? 200;
    this.logger = options.logger ?? createConsoleLogger("PdfImages");
  }

  /**
   * Counts pages with pdf-lib. Throws for anything pdf-lib cannot open.
   */
  private async countPages(filePath: string): Promise<number> {
    const bytes = await readFile(filePath);
    try {
      const document = await PDFDocument.load(bytes, {
        ignoreEncryption: true,
        updateMetadata: false,
      });
      return document.getPageCount();
    } catch (error) {
      throw new Error(
        `Cannot read PDF ${basename(filePath)}: ${errorMessage(error)}`,
      );
    }
  }

  async render(filePath: string, maxPages: number): Promise<PageImage[]> {
    const pageCount = await this.countPages(filePath);
    const lastPage = Math.min(maxPages, MAX_RENDER_PAGES, pageCount);
    if (lastPage < 1) {
      return [];
    }

    this.logger.info(
      `Converting PDF to images: ${basename(filePath)} (pages 1-${lastPage})`,
    );

    const workDir = await mkdtemp(join(tmpdir(), "pdf-images-"));
    try {
      try {
        await execFileAsync("pdftoppm", [
          "-png",
          "-r",
          String(this.dpi),
          "-f",
          "1",
          "-l",
          String(lastPage),
          filePath,
          join(workDir, "page"),
        ]);
      } catch (error) {
        if (isNotFoundError(error)) {
          this.logger.warn("pdftoppm not available, rendering no images");
          return [];
        }
        throw error;
      }

      const files = (await readdir(workDir))
        .filter((name) => PAGE_FILE.test(name))
        .sort((a, b) => pageIndexOf(a) - pageIndexOf(b));

      const images: PageImage[] = [];
      for (const [pageNumber, name] of files.entries()) {
        const png = await readFile(join(workDir, name));
        const base64 = png.toString("base64");
        images.push({ pageNumber, mediaType: "image/png", base64 });
        this.logger.info(
          `  Page ${pageNumber}: ${base64.length} bytes (base64)`,
        );
      }
      return images;
    } finally {
      await rm(workDir, { recursive: true, force: true }).catch((error) =>
        this.logger.warn(
          `Failed to remove ${workDir}: ${errorMessage(error)}`,
        ),
      );
    }
  }
}
