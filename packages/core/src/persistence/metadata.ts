/**
 * Size and location of a file touched by a persistence operation.
 */
export interface Metadata {
	/** Bytes written, found on disk, or removed */
	readonly size: number
	readonly path: string
}

export const formatMetadata = (metadata: Metadata): string =>
	`${metadata.size} bytes @ ${metadata.path}`
