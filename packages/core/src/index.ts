/**
 * Main entry point for @filebound/core.
 *
 * Exports the Effect-based API: typed errors, base directory and path
 * resolution, byte-level codecs, Service/Layer storage, bindings and
 * persistence handles.
 */

// ============================================================================
// Error Types (Effect TaggedError)
// ============================================================================

export {
	DecodeError,
	EncodeError,
	InvalidRangeError,
	IoError,
	NotFoundError,
	PathResolutionError,
	UnsupportedFormatError,
} from "./errors/persist-errors.js";

export type {
	PathResolutionReason,
	PersistError,
} from "./errors/persist-errors.js";

// ============================================================================
// Base Directories
// ============================================================================

export {
	Dir,
	describeDirectory,
	isCustomDirectory,
} from "./dirs/base-directory.js";

export type {
	BaseDirectory,
	CustomDirectory,
	StandardDirectoryKind,
} from "./dirs/base-directory.js";

export { resolveBaseDirectory } from "./dirs/os-directories.js";

export type { PlatformEnvironment } from "./dirs/os-directories.js";

export {
	BaseDirectories,
	makeBaseDirectoriesLayer,
} from "./dirs/base-directories-service.js";

export type { BaseDirectoriesShape } from "./dirs/base-directories-service.js";

// ============================================================================
// Path Resolution
// ============================================================================

export {
	MAX_SEGMENT_BYTES,
	MAX_SUB_DIRECTORY_DEPTH,
	MAX_TOTAL_BYTES,
	projectSegment,
	resolvePaths,
	splitSubDirectory,
} from "./paths/path-resolver.js";

export type { PathInput, ResolvedPaths } from "./paths/path-resolver.js";

// ============================================================================
// Serializers
// ============================================================================

export {
	canonicalExtension,
	makeSerializerLayer,
	makeSerializerRegistry,
	makeTextCodec,
} from "./serializers/format-codec.js";

export type {
	FormatCodec,
	TextFormatCodec,
} from "./serializers/format-codec.js";

export { SerializerRegistry } from "./serializers/serializer-service.js";

export type { SerializerRegistryShape } from "./serializers/serializer-service.js";

export { binaryCodec } from "./serializers/codecs/binary.js";
export { bsonCodec } from "./serializers/codecs/bson.js";
export { emptyCodec } from "./serializers/codecs/empty.js";
export { jsonCodec } from "./serializers/codecs/json.js";
export type { JsonCodecOptions } from "./serializers/codecs/json.js";
export { msgpackCodec } from "./serializers/codecs/msgpack.js";
export { plainCodec } from "./serializers/codecs/plain.js";
export { tomlCodec } from "./serializers/codecs/toml.js";
export { yamlCodec } from "./serializers/codecs/yaml.js";
export type { YamlCodecOptions } from "./serializers/codecs/yaml.js";

export {
	AllFormatsLayer,
	allCodecs,
	DefaultSerializerLayer,
} from "./serializers/presets.js";

export { inferCodecsFromBindings } from "./serializers/infer-codecs.js";

// ============================================================================
// Storage
// ============================================================================

export { StorageAdapter } from "./storage/storage-service.js";

export type { StorageAdapterShape } from "./storage/storage-service.js";

export { makeInMemoryStorageLayer } from "./storage/in-memory-adapter-layer.js";

// ============================================================================
// Byte Transforms
// ============================================================================

export {
	compress,
	decompress,
	DEFAULT_COMPRESSION_LEVEL,
} from "./transforms/gzip.js";

export type { CompressionLevel } from "./transforms/gzip.js";

export {
	HEADER_LENGTH,
	HEADER_MAGIC_LENGTH,
	headerFromString,
	prependHeader,
	readHeaderVersion,
	stripHeader,
} from "./transforms/header.js";

export type { FileHeader } from "./transforms/header.js";

// ============================================================================
// Bindings, Persistence, Store
// ============================================================================

export { defineBinding } from "./binding/binding.js";

export type { Binding, BindingConfig } from "./binding/binding.js";

export { makePersistent } from "./persistence/persistent.js";

export type {
	PersistenceServices,
	Persistent,
	ResolveError,
} from "./persistence/persistent.js";

export { formatMetadata } from "./persistence/metadata.js";

export type { Metadata } from "./persistence/metadata.js";

export { createStore } from "./store/create-store.js";

export type { Store, StoreConfig } from "./store/create-store.js";
