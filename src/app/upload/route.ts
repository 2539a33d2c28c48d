/**
 * POST /upload
 *
 * Accepts multipart/form-data with one document (PDF, DOC or DOCX) under the
 * field name "file".  Responds with the OCR output, the language-model
 * corrected text of every page and the completion time.
 */

import { NextRequest, NextResponse } from "next/server";
import { getUploadDependencies, handleUpload } from "@/lib/ocr-pipeline";

export const runtime = "nodejs";

export async function POST(request: NextRequest) {
    const { status, body } = await handleUpload(request, getUploadDependencies);
    return NextResponse.json(body, { status });
}
