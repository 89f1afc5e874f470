import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import cors from 'cors';
import { z } from 'zod';
import type { JobService } from '../../application/services/JobService.js';
import type { JobSubmission } from '../../core/entities/Job.js';
import { getErrorMessage } from '../../utils/errors.js';

export const SummarizeRequestSchema = z.object({
  transcript: z.string(),
});

interface ValidationIssue {
  loc: Array<string | number>;
  msg: string;
  type: string;
}

function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    loc: ['body', ...issue.path],
    msg: issue.message,
    type: issue.code,
  }));
}

// Meeting transcripts easily exceed express.json()'s 100kb default
export const DEFAULT_BODY_LIMIT = '10mb';

export interface WebServerOptions {
  bodyLimit?: string;
  debug?: boolean;
}

/**
 * express.json() reports unparsable bodies with this type tag
 */
function isBodyParseError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

/**
 * 4xx status carried by body-parser errors (e.g. 413 for oversized bodies)
 */
function getClientErrorStatus(error: unknown): number | null {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = error.status;
    if (typeof status === 'number' && status >= 400 && status < 500) {
      return status;
    }
  }
  return null;
}

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;

  constructor(
    private jobService: JobService,
    private port: number = 8000,
    private options: WebServerOptions = {}
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandler();
  }

  public getApp(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json({ limit: this.options.bodyLimit ?? DEFAULT_BODY_LIMIT }));
  }

  private setupRoutes(): void {
    // Liveness
    this.app.get('/health', (req: Request, res: Response) => {
      res.json({ status: 'ok' });
    });

    // Submit a transcript; answers before any agent runs
    this.app.post('/summarize', (req: Request, res: Response) => {
      const parsed = SummarizeRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(422).json({ detail: toValidationIssues(parsed.error) });
        return;
      }

      const jobId = this.jobService.submitJob(parsed.data.transcript);
      if (this.options.debug) {
        console.error(`[DEBUG] [WebServer] Job ${jobId} queued`);
      }
      const body: JobSubmission = { job_id: jobId, status: 'queued' };
      res.json(body);
    });

    // Poll job status
    this.app.get('/jobs/:jobId', (req: Request, res: Response) => {
      const job = this.jobService.getJobStatus(req.params.jobId);
      if (!job) {
        res.status(404).json({ detail: 'job not found' });
        return;
      }
      res.json(job);
    });
  }

  private setupErrorHandler(): void {
    this.app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }
      if (isBodyParseError(error)) {
        res.status(400).json({ detail: 'Invalid JSON body' });
        return;
      }
      const clientStatus = getClientErrorStatus(error);
      if (clientStatus !== null) {
        res.status(clientStatus).json({ detail: getErrorMessage(error) });
        return;
      }
      console.error(`[WebServer] ✗ ${req.method} ${req.path} failed:`, error);
      res.status(500).json({ detail: getErrorMessage(error) });
    });
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      try {
        this.httpServer = this.app.listen(this.port, () => {
          console.error(`[WebServer] API available at http://localhost:${this.port}`);
          resolve();
        });

        this.httpServer.on('error', (error) => {
          console.error('[WebServer] Server error:', error);
          reject(error);
        });
      } catch (error) {
        reject(error);
      }
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.httpServer) {
        this.httpServer.close(() => {
          console.error('[WebServer] HTTP server closed');
          this.httpServer = null;
          resolve();
        });
      } else {
        resolve();
      }
    });
  }

  public isRunning(): boolean {
    return this.httpServer !== null;
  }
}
