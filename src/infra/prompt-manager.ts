import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import Mustache from 'mustache';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export type PromptView = Record<string, unknown>;

export class PromptManager {
  private static instance: PromptManager;
  private cache = new Map<string, string>();

  constructor(private promptDir: string = path.resolve(__dirname, '..', 'prompts')) {}

  public static getInstance(): PromptManager {
    if (!PromptManager.instance) {
      PromptManager.instance = new PromptManager();
    }
    return PromptManager.instance;
  }

  public render(templateName: string, data: PromptView): string {
    return Mustache.render(this.load(templateName), data);
  }

  private load(templateName: string): string {
    const cached = this.cache.get(templateName);
    if (cached !== undefined) {
      return cached;
    }

    const filePath = path.join(this.promptDir, `${templateName}.mustache`);
    if (!fs.existsSync(filePath)) {
      throw new Error(`Prompt template not found: ${filePath}`);
    }
    const template = fs.readFileSync(filePath, 'utf-8');
    this.cache.set(templateName, template);
    return template;
  }
}
