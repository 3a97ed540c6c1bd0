import { XMLParser, XMLValidator } from 'fast-xml-parser'

import { parseApiDate } from './dates'
import { MalformedResponseError } from './errors'

const ATTRIBUTE_PREFIX = '@_'
const TEXT_NODE = '#text'

// Elements the API repeats; parsed as arrays even when only one is present
const REPEATED_ELEMENTS = new Set(['row', 'rowset'])

const parser = new XMLParser({
	ignoreAttributes: false,
	attributeNamePrefix: ATTRIBUTE_PREFIX,
	textNodeName: TEXT_NODE,
	parseTagValue: false,
	parseAttributeValue: false,
	trimValues: true,
	isArray: (name, _jpath, _isLeafNode, isAttribute) => !isAttribute && REPEATED_ELEMENTS.has(name),
})

interface PathSegment {
	name: string
	attribute?: { name: string; value: string }
}

const SEGMENT_PATTERN = /^([A-Za-z_][\w.-]*)(?:\[@([\w-]+)=['"]?([^'"\]]*)['"]?\])?$/

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseSegment(segment: string): PathSegment {
	const match = SEGMENT_PATTERN.exec(segment)
	if (!match) {
		throw new Error(`Invalid document path segment: ${segment}`)
	}
	const [, name, attributeName, attributeValue] = match
	return attributeName !== undefined
		? { name, attribute: { name: attributeName, value: attributeValue ?? '' } }
		: { name }
}

/**
 * Read-only view of one element of a parsed API document.
 *
 * Paths are `/` separated element names relative to this node. A segment may
 * select by attribute value (`rowset[@name=skills]`), and `firstValue` accepts
 * a final `@attribute` segment:
 *
 * @example
 * ```ts
 * doc.firstValue('result/key/@accessMask')
 * doc.allNodes('result/key/rowset[@name=characters]/row')
 * ```
 *
 * Empty strings are reported as absent.
 */
export class XmlNode {
	constructor(private readonly raw: unknown) {}

	attribute(name: string): string | undefined {
		if (!isRecord(this.raw)) {
			return undefined
		}
		const value = this.raw[`${ATTRIBUTE_PREFIX}${name}`]
		return typeof value === 'string' && value !== '' ? value : undefined
	}

	text(): string | undefined {
		const value = isRecord(this.raw) ? this.raw[TEXT_NODE] : this.raw
		if (typeof value === 'string') {
			return value !== '' ? value : undefined
		}
		if (typeof value === 'number' || typeof value === 'boolean') {
			return String(value)
		}
		return undefined
	}

	children(name: string): XmlNode[] {
		if (!isRecord(this.raw)) {
			return []
		}
		const value = this.raw[name]
		if (value === undefined) {
			return []
		}
		return Array.isArray(value) ? value.map((child) => new XmlNode(child)) : [new XmlNode(value)]
	}

	allNodes(path: string): XmlNode[] {
		let nodes: XmlNode[] = [this]
		for (const segment of path.split('/').filter((s) => s !== '')) {
			const { name, attribute } = parseSegment(segment)
			nodes = nodes.flatMap((node) =>
				node
					.children(name)
					.filter((child) => !attribute || child.attribute(attribute.name) === attribute.value)
			)
		}
		return nodes
	}

	firstValue(path: string): string | undefined {
		const segments = path.split('/').filter((s) => s !== '')
		const last = segments[segments.length - 1]

		if (last !== undefined && last.startsWith('@')) {
			const owners = segments.length > 1 ? this.allNodes(segments.slice(0, -1).join('/')) : [this]
			for (const owner of owners) {
				const value = owner.attribute(last.slice(1))
				if (value !== undefined) {
					return value
				}
			}
			return undefined
		}

		return this.allNodes(path)[0]?.text()
	}
}

export interface ApiErrorDetail {
	code?: number
	message: string
}

/**
 * A parsed `<eveapi>` response
 */
export class ApiDocument extends XmlNode {
	readonly currentTime?: Date
	readonly cachedUntil?: Date
	readonly error?: ApiErrorDetail

	constructor(root: Record<string, unknown>) {
		super(root)
		this.currentTime = parseApiDate(this.firstValue('currentTime'))
		this.cachedUntil = parseApiDate(this.firstValue('cachedUntil'))

		const errorNode = this.children('error')[0]
		if (errorNode) {
			const code = Number(errorNode.attribute('code'))
			this.error = {
				code: Number.isInteger(code) ? code : undefined,
				message: errorNode.text() ?? 'Unknown API error',
			}
		}
	}
}

function readDocument(body: string): ApiDocument | string {
	const validation = XMLValidator.validate(body)
	if (validation !== true) {
		return `is not well-formed XML: ${validation.err.msg} (line ${validation.err.line})`
	}

	const parsed: unknown = parser.parse(body)
	const root = isRecord(parsed) ? parsed['eveapi'] : undefined
	if (!isRecord(root)) {
		return 'has no eveapi element'
	}

	return new ApiDocument(root)
}

/**
 * Parse a response body into an {@link ApiDocument}
 *
 * @throws MalformedResponseError when the body is not well-formed XML or has
 * no `eveapi` root element
 */
export function parseApiDocument(body: string, endpoint: string): ApiDocument {
	const document = readDocument(body)
	if (typeof document === 'string') {
		throw new MalformedResponseError(`Response from ${endpoint} ${document}`, endpoint)
	}
	return document
}

/**
 * Like {@link parseApiDocument}, but returns undefined instead of throwing.
 * Used to pull error details out of non-success responses.
 */
export function tryParseApiDocument(body: string): ApiDocument | undefined {
	const document = readDocument(body)
	return typeof document === 'string' ? undefined : document
}
