//src/middleware/csvUpload.ts
import multer from "multer";
import { ValidationError } from "../utils/errors";

const ACCEPTED_MIME_TYPES = new Set(["text/csv", "text/plain", "application/vnd.ms-excel", "application/octet-stream"]);

// kept in memory: the importer reads the bytes once and discards them
export const csvUpload = multer({
  storage: multer.memoryStorage(),
  fileFilter: (_req, file, cb) => {
    const name = file.originalname.toLowerCase();
    if (ACCEPTED_MIME_TYPES.has(file.mimetype) || name.endsWith(".csv") || name.endsWith(".txt")) {
      cb(null, true);
    } else {
      cb(new ValidationError("Only CSV and TXT files are supported"));
    }
  },
  limits: {
    fileSize: 10 * 1024 * 1024, // 10MB
  },
});
