import express from "express";
import type { NextFunction, Request, Response } from "express";
import multer from "multer";
import * as path from "path";
import * as fs from "fs";
import {
  createAcademicDocument,
  errorMessage,
  errorStatus,
  outputFileName,
  readFormatRequest,
} from "./formatter";

const app = express();
const PORT = Number(process.env.PORT) || 3000;

const projectRoot = process.cwd();
const outputDir = path.resolve(process.env.OUTPUT_DIR || path.join(projectRoot, "output"));
const uploadsDir = path.resolve(process.env.UPLOAD_DIR || path.join(projectRoot, "uploads"));

// Configure multer for text uploads
const upload = multer({
  dest: uploadsDir,
  limits: { fileSize: 5 * 1024 * 1024 }, // 5MB limit
});

app.use(express.json({ limit: "5mb" }));

// Request logging middleware - logs ALL requests
app.use((req: Request, res: Response, next: NextFunction) => {
  console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
  next();
});

app.get("/api/health", (req: Request, res: Response) => {
  res.json({ status: "ok", timestamp: new Date().toISOString() });
});

// Format raw text (JSON body or uploaded text file) into an APA .docx
app.post("/api/format", upload.single("document"), async (req: Request, res: Response) => {
  const uploadedPath = req.file?.path;

  try {
    const uploadedText = uploadedPath ? fs.readFileSync(uploadedPath, "utf8") : undefined;
    const { titleData, text } = readFormatRequest(req.body, uploadedText);

    const filename = outputFileName(titleData);
    const result = await createAcademicDocument(titleData, text, path.join(outputDir, filename));

    res.json({
      success: true,
      downloadUrl: `/api/download/${encodeURIComponent(filename)}`,
      summary: {
        bodyBlocks: result.blocks.length,
        references: result.references.length,
        bytes: result.bytes,
      },
    });
  } catch (error) {
    if (errorStatus(error) === 400) {
      console.warn(`[server] Rejected format request: ${errorMessage(error)}`);
      res.status(400).json({ error: errorMessage(error) });
      return;
    }
    console.error("[server] Error formatting document:", error);
    res.status(500).json({ error: "Failed to format document", details: errorMessage(error) });
  } finally {
    if (uploadedPath && fs.existsSync(uploadedPath)) {
      fs.unlinkSync(uploadedPath);
    }
  }
});

app.get("/api/download/:filename", (req: Request, res: Response) => {
  // Only plain file names inside the output directory
  const filename = path.basename(req.params.filename);
  const filePath = path.join(outputDir, filename);

  if (!filename.endsWith(".docx") || !fs.existsSync(filePath)) {
    console.error(`[server] File not found: ${filePath}`);
    res.status(404).json({ error: "File not found", requested: filename });
    return;
  }

  res.download(filePath, filename, (err) => {
    if (err) {
      console.error("[server] Error downloading file:", err);
      if (!res.headersSent) {
        res.status(500).json({ error: "Failed to download file" });
      }
    }
  });
});

// Create necessary directories
[uploadsDir, outputDir].forEach((dirPath) => {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
    console.log(`[server] Created directory: ${dirPath}`);
  }
});

// Global error handler for unhandled errors
process.on("unhandledRejection", (reason) => {
  console.error("UNHANDLED REJECTION:", reason);
});

process.on("uncaughtException", (error) => {
  console.error("UNCAUGHT EXCEPTION:", error);
  process.exit(1);
});

app.listen(PORT, () => {
  console.log(`[server] Running on http://localhost:${PORT}`);
});
