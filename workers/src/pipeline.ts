/**
 * Two-stage extraction of the selected products from a submittal PDF.
 *
 * conversion (cached) → text → page images (cached) → stage 1 candidates →
 * stage 2 visual judgment → candidates picked by the judged indices.
 */

import { basename } from "path";
import { z } from "zod";
import type {
  ExtractionResult,
  PageImage,
  Product,
  SelectionOrder,
} from "./types.js";
import type { ExtractorConfig, JudgeInput } from "./config.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import { errorMessage } from "./errors.js";
import type { JobStore } from "./jobs/job-store.js";
import { FileJobStore, InMemoryJobStore } from "./jobs/job-store.js";
import type { ExternalJobSource } from "./jobs/job-poller.js";
import { ExternalJobPoller } from "./jobs/job-poller.js";
import { deriveIdentityKey } from "./jobs/identity.js";
import { DatalabClient } from "./conversion/datalab.js";
import { extractTextFromConversion } from "./conversion/text.js";
import type { PageRenderer } from "./rendering/pdf-images.js";
import { PdftoppmRenderer } from "./rendering/pdf-images.js";
import type { CandidateExtractor } from "./stages/candidate-extraction.js";
import { LlmCandidateExtractor } from "./stages/candidate-extraction.js";
import type { VisualJudge } from "./stages/visual-judgment.js";
import { LlmVisualJudge } from "./stages/visual-judgment.js";
import { normalizeCandidates, serializeCandidates } from "./candidates.js";
import { applySelection, parseSelection } from "./selection.js";
import { LLMClient } from "./llm/index.js";

export const IMAGES_ARTIFACT = "images";

export interface ConversionService {
  /** Binds a document to the service for the job poller */
  source(filePath: string): ExternalJobSource;
}

export interface PipelineDependencies {
  store: JobStore;
  poller: ExternalJobPoller;
  conversion: ConversionService;
  renderer: PageRenderer;
  extractor: CandidateExtractor;
  judge: VisualJudge;
  logger?: Logger;
}

export interface PipelineOptions {
  /** Pages rendered for the judge. Default: 10 */
  maxPages?: number;
  /** Resolution the renderer was built with; keys cached page images. Default: 200 */
  renderDpi?: number;
  /** Default: "raw" */
  judgeInput?: JudgeInput;
  /** Default: "selection" */
  selectionOrder?: SelectionOrder;
}

const pageImagesSchema = z.array(
  z.object({
    pageNumber: z.number().int(),
    mediaType: z.string(),
    base64: z.string(),
  }),
);

export class SubmittalPipeline {
  private readonly logger: Logger;
  private readonly maxPages: number;
  private readonly renderDpi: number;
  private readonly judgeInput: JudgeInput;
  private readonly selectionOrder: SelectionOrder;

  constructor(
    private readonly deps: PipelineDependencies,
    options: PipelineOptions = {},
  ) {
    this.logger = deps.logger ?? createConsoleLogger("Pipeline");
    this.maxPages = options.maxPages ?? 10;
    this.renderDpi = options.renderDpi ?? 200;
    this.judgeInput = options.judgeInput ?? "raw";
    this.selectionOrder = options.selectionOrder ?? "selection";
  }

  /**
   * Wires the production collaborators from configuration. Missing
   * credentials only warn here; the call that needs one fails.
   */
  static fromConfig(
    config: ExtractorConfig,
    logger: Logger = createConsoleLogger("Pipeline"),
  ): SubmittalPipeline {
    if (config.llm.provider === "anthropic" && !config.llm.anthropicApiKey) {
      logger.warn("ANTHROPIC_API_KEY not set");
    }
    if (!config.datalab.apiKey) {
      logger.warn("DATALAB_API_KEY not set");
    }

    const store: JobStore = config.cache.enabled
      ? new FileJobStore(config.cache.dir)
      : new InMemoryJobStore();
    const client = new LLMClient(config.llm);

    return new SubmittalPipeline(
      {
        store,
        poller: new ExternalJobPoller(store, {
          maxAttempts: config.datalab.pollAttempts,
          intervalMs: config.datalab.pollIntervalMs,
        }),
        conversion: new DatalabClient({
          apiKey: config.datalab.apiKey,
          endpoint: config.datalab.endpoint,
        }),
        renderer: new PdftoppmRenderer({ dpi: config.pipeline.renderDpi }),
        extractor: new LlmCandidateExtractor(client),
        judge: new LlmVisualJudge(client),
        logger,
      },
      config.pipeline,
    );
  }

  /**
   * Runs both stages. Never throws: any failure becomes a failure result.
   */
  async run(pdfPath: string): Promise<ExtractionResult> {
    const documentName = basename(pdfPath);
    this.logger.info(`Processing: ${documentName}`);

    try {
      const identityKey = await deriveIdentityKey(pdfPath);

      const { payload } = await this.deps.poller.resolve(
        identityKey,
        this.deps.conversion.source(pdfPath),
      );
      const text = extractTextFromConversion(payload);
      this.logger.info(`Extracted ${text.length} chars of text`);

      const images = await this.loadImages(identityKey, pdfPath);
      this.logger.info(`Converted ${images.length} pages to images`);

      const rawCandidates = await this.deps.extractor.extract(
        text,
        documentName,
      );
      const { candidates, rootKind, error } = normalizeCandidates(
        rawCandidates,
        documentName,
      );
      if (error) {
        this.logger.warn(error.message);
      }
      this.logger.info(
        `Stage 1: Found ${candidates.length} candidates (${rootKind})`,
      );

      const judgeText = await this.deps.judge.judge(
        images,
        this.candidatesTextForJudge(rawCandidates, candidates),
      );
      const selection = parseSelection(judgeText);
      this.logger.info(
        `Stage 2: Selected ${selection.selected_ids.length} indices -> ${JSON.stringify(selection.selected_ids)}`,
      );

      const products = applySelection(
        candidates,
        selection.selected_ids,
        this.selectionOrder,
      );
      this.logger.info(`Stage 2: Selected ${products.length} products`);
      this.logger.info(`Stage 2: Evidence -> ${selection.evidence}`);

      return {
        success: true,
        identity_key: identityKey,
        evidence: selection.evidence,
        products,
        candidates: [...candidates],
        judge_response: selection,
      };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Error: ${message}`);
      return { success: false, error: message, products: [] };
    }
  }

  /**
   * Selected products only; an empty list when extraction failed.
   */
  async extractProducts(pdfPath: string): Promise<Product[]> {
    const result = await this.run(pdfPath);
    if (result.success) {
      return result.products;
    }
    this.logger.warn(`Extraction failed: ${result.error}`);
    return [];
  }

  /**
   * The judge indexes into whatever text it is shown. The normalized form
   * matches the candidate list position for position; an empty list is sent
   * as empty text so the judge skips the model call.
   */
  private candidatesTextForJudge(
    rawCandidates: string,
    candidates: readonly Product[],
  ): string {
    if (this.judgeInput === "raw") {
      return rawCandidates;
    }
    return candidates.length > 0 ? serializeCandidates(candidates) : "";
  }

  private async loadImages(
    identityKey: string,
    pdfPath: string,
  ): Promise<PageImage[]> {
    // A render is only reused under the same page limit and resolution
    const imagesKey = `${identityKey}-p${this.maxPages}-${this.renderDpi}dpi`;
    const cached = pageImagesSchema.safeParse(
      await this.deps.store.loadArtifact(IMAGES_ARTIFACT, imagesKey),
    );
    if (cached.success && cached.data.length > 0) {
      this.logger.info(`Loaded ${cached.data.length} page images from cache`);
      return cached.data;
    }

    const images = await this.deps.renderer.render(pdfPath, this.maxPages);
    if (images.length > 0) {
      await this.deps.store.persistArtifact(
        IMAGES_ARTIFACT,
        imagesKey,
        images,
      );
    }
    return images;
  }
}
