import type { FetchContentOptions, ParseContext, WebContent } from './types.js';

type ResolveParserResult<T> = {
  content: T;
  pluginName?: string;
};

/**
 * The first plugin that applies extracts the content; when none does, the
 * options' `htmlParser` is used.
 */
async function resolveParserWithPlugins<T>(
  content: WebContent<string>,
  options: FetchContentOptions<T>,
  context: ParseContext,
): Promise<ResolveParserResult<T>> {
  for (const plugin of options.plugins ?? []) {
    const shouldApply = await plugin.applies({ content, context });
    if (!shouldApply) continue;

    return {
      content: await plugin.extract(content, context),
      pluginName: plugin.name,
    };
  }

  return {
    content: await options.htmlParser.extract(content, context),
  };
}

export type { ResolveParserResult };
export { resolveParserWithPlugins };
