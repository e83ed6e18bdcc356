/**
 * Stages the generated report files into a directory served as a static
 * site. Missing outputs are skipped with a warning; when only the PDF
 * exists a redirect page stands in for index.html.
 */
import { access, copyFile, mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { HTML_FILE, OUTPUT_FILES, PDF_FILE } from "../constants";
import { getLogger } from "@src/util/logger";

export const REDIRECT_PAGE = `<!doctype html>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>Report</title>
<p>If you are not redirected, <a href="./${PDF_FILE}">open the PDF</a>.</p>
<script>location.href="./${PDF_FILE}";</script>
`;

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export interface PublishResult {
  copied: string[];
  missing: string[];
  redirectWritten: boolean;
}

export async function publishOutputs(
  sourceDir: string,
  publishDir: string
): Promise<PublishResult> {
  const logger = getLogger("reporting/publish_outputs");
  await mkdir(publishDir, { recursive: true });

  const copied: string[] = [];
  const missing: string[] = [];
  for (const file of OUTPUT_FILES) {
    const source = join(sourceDir, file);
    if (await exists(source)) {
      await copyFile(source, join(publishDir, file));
      copied.push(file);
    } else {
      missing.push(file);
      logger.warn({ file }, "missing output, continuing");
    }
  }

  let redirectWritten = false;
  if (!copied.includes(HTML_FILE) && copied.includes(PDF_FILE)) {
    await writeFile(join(publishDir, HTML_FILE), REDIRECT_PAGE, "utf-8");
    redirectWritten = true;
  }

  logger.info({ publishDir, copied, missing, redirectWritten }, "outputs published");
  return { copied, missing, redirectWritten };
}
