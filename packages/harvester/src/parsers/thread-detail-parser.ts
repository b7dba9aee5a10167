import * as cheerio from 'cheerio'
import { ContentParseError } from '../errors.js'
import { type ParseContext, type WebContent, WebContentParser } from '../web-engine/types.js'

export const THREAD_BODY_SELECTORS = ["div[role='main']", 'main', 'article', 'body'] as const

const BLOCK_ELEMENTS = 'div, section, article, p, br, li, tr, blockquote, pre, h1, h2, h3, h4, h5, h6'

export class ThreadContentMissingError extends ContentParseError {
	readonly url: string

	constructor(url: string) {
		super(`No thread content found at ${url}`)
		this.name = 'ThreadContentMissingError'
		this.url = url
	}
}

/** Whitespace-collapsed text of the first non-empty thread body container. */
export class ThreadDetailParser extends WebContentParser<string, string> {
	public async extract(content: WebContent<string>, _context?: ParseContext): Promise<string> {
		const $ = cheerio.load(content.data)
		$('script, style, noscript, template').remove()
		$(BLOCK_ELEMENTS).after('\n')

		for (const selector of THREAD_BODY_SELECTORS) {
			const text = $(selector).first().text().replace(/\s+/g, ' ').trim()
			if (text) {
				return text
			}
		}

		throw new ThreadContentMissingError(content.url)
	}
}
