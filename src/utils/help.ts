import * as fs from "node:fs";
import { kBlockSize, kMaxBlockCount, kMaxImageSize } from "./cpr/cpr";
import { getPathRelativeToTemplates, applyTemplateVariables } from "./templates";
import { getAppVersion } from "./versionString";

function loadHelpTemplate(templateName: string): string {
  const templatePath = getPathRelativeToTemplates(`help/${templateName}.txt`);
  if (!fs.existsSync(templatePath)) {
    throw new Error(`Help template not found: ${templatePath}`);
  }
  return fs.readFileSync(templatePath, "utf-8");
}

export function renderHelpTemplate(templateName: string): string {
  const template = loadHelpTemplate(templateName);
  const variables: Record<string, string> = {
    VERSION: getAppVersion(),
    BLOCK_SIZE: String(kBlockSize),
    MAX_BLOCKS: String(kMaxBlockCount),
    MAX_IMAGE_SIZE: String(kMaxImageSize),
  };
  return applyTemplateVariables(template, variables);
}

export function printMainHelp(): void {
  console.log(renderHelpTemplate("main"));
}
