import type { ToolContext } from "../context.js";
import { which } from "../shared/which.js";

/** $EDITOR when set, else the first configured fallback found on PATH. */
export async function resolveEditor(ctx: ToolContext): Promise<string | null> {
  const preferred = ctx.env.vars.EDITOR;
  if (preferred) return preferred;

  for (const candidate of ctx.config.editor.fallbacks) {
    if ((await which(candidate, ctx.env)) !== null) return candidate;
  }
  return null;
}

/** Open a file in the user's editor and wait for it to exit. */
export async function openInEditor(ctx: ToolContext, filePath: string): Promise<void> {
  const editor = await resolveEditor(ctx);
  if (editor === null) {
    ctx.out.line("No suitable editor found! Please set $EDITOR.");
    return;
  }
  await ctx.executor.execute({ argv: [editor, filePath] });
}
