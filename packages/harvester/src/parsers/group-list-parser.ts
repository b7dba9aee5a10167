import * as cheerio from 'cheerio'
import { type ParseContext, type WebContent, WebContentParser } from '../web-engine/types.js'

export interface ListedThread {
	href: string
	title: string
	timestampLabel: string
	author: string
}

export interface GroupListPage {
	sourceUrl: string
	threads: ListedThread[]
	nextPageHref?: string
}

/** Tried in order; the first selector with a match wins. */
export const LISTING_SELECTORS = {
	row: ["div[role='listitem']", "[role='row']", 'article'],
	title: ["[role='heading']", 'div.HzV7m-bN97Pc', 'a'],
	date: ['span.zX2W9c', 'time', '[data-date]'],
	author: ['span.z0LcW', '[data-author]', '.author'],
	nextPage: ["a[aria-label='Next page']", "a[rel='next']", '.pagination .next a']
} as const

/**
 * Reads the thread rows of a group listing page. Rows without a link are
 * dropped; missing title, date or author come back as empty strings.
 */
export class GroupListParser extends WebContentParser<string, GroupListPage> {
	public async extract(content: WebContent<string>, _context?: ParseContext): Promise<GroupListPage> {
		const $ = cheerio.load(content.data)
		const threads: ListedThread[] = []
		const rowSelector = LISTING_SELECTORS.row.find((selector) => $(selector).length > 0)

		if (rowSelector) {
			$(rowSelector).each((_, element) => {
				const row = $(element)
				const href = this.optionalText(row.find('a[href]').first().attr('href'))
				if (!href) {
					return
				}

				const firstText = (selectors: readonly string[], attribute?: string): string => {
					for (const selector of selectors) {
						const match = row.find(selector).first()
						const text = this.optionalText((attribute ? match.attr(attribute) : undefined) ?? match.text())
						if (text) {
							return text
						}
					}

					return ''
				}

				threads.push({
					href,
					title: firstText(LISTING_SELECTORS.title),
					timestampLabel: firstText(LISTING_SELECTORS.date),
					author: firstText(LISTING_SELECTORS.author, 'data-author')
				})
			})
		}

		return {
			sourceUrl: content.url,
			threads,
			nextPageHref: this.extractNextPageHref($)
		}
	}

	private extractNextPageHref($: cheerio.CheerioAPI): string | undefined {
		for (const selector of LISTING_SELECTORS.nextPage) {
			const href = this.optionalText($(selector).first().attr('href'))
			if (href) {
				return href
			}
		}

		return undefined
	}

	private optionalText(value: string | undefined): string | undefined {
		if (!value) {
			return undefined
		}

		const normalized = value.replace(/\s+/g, ' ').trim()
		return normalized.length ? normalized : undefined
	}
}
