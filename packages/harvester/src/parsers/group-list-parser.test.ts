import { readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { describe, expect, it } from 'vitest'
import { GroupListParser } from './group-list-parser.js'

const listingHtml = readFileSync(resolve(import.meta.dirname, '__fixtures__/group-listing.html'), 'utf-8')
const sourceUrl = 'https://groups.example.com/g/soil-carbon'
const context = { engine: 'http', requestUrl: sourceUrl }

describe('GroupListParser', () => {
	it('reads linked rows with title, date and author', async () => {
		const page = await new GroupListParser().extract({ url: sourceUrl, data: listingHtml }, context)

		expect(page.sourceUrl).toBe(sourceUrl)
		expect(page.threads).toEqual([
			{
				href: '/g/soil-carbon/c/a1b2',
				title: 'Biochar dosing for clay soils',
				timestampLabel: 'Mar 4',
				author: 'R. Soil'
			},
			{
				href: 'https://groups.example.com/g/soil-carbon/c/c3d4#msg-2',
				title: 'Cover crop termination timing',
				timestampLabel: 'Feb 11',
				author: 'M. Loam'
			}
		])
	})

	it('finds the next page link', async () => {
		const page = await new GroupListParser().extract({ url: sourceUrl, data: listingHtml }, context)

		expect(page.nextPageHref).toBe('/g/soil-carbon?page=2')
	})

	it('falls back to later row selectors', async () => {
		const html = `
			<table>
				<tr role="row"><td><a href="/t/1" rel="bookmark">First topic</a><span class="author">kim</span></td></tr>
				<tr role="row"><td><a href="/t/2">Second topic</a></td></tr>
			</table>
			<a rel="next" href="/latest?page=3">more</a>`

		const page = await new GroupListParser().extract({ url: sourceUrl, data: html }, context)

		expect(page.threads).toEqual([
			{ href: '/t/1', title: 'First topic', timestampLabel: '', author: 'kim' },
			{ href: '/t/2', title: 'Second topic', timestampLabel: '', author: '' }
		])
		expect(page.nextPageHref).toBe('/latest?page=3')
	})

	it('returns no threads and no next page for an empty listing', async () => {
		const page = await new GroupListParser().extract(
			{ url: sourceUrl, data: '<html><body><p>No conversations yet</p></body></html>' },
			context
		)

		expect(page.threads).toEqual([])
		expect(page.nextPageHref).toBeUndefined()
	})
})
