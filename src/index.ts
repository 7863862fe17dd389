export * from './types/pathway';
export * from './types/vocabulary';
export * from './errors';
export { ENV, GPML_CONFIG, LOG_CONFIG, type LogLevel } from './config/env';
export { Logger, type WideEvent, type Severity } from './services/logger';
export { IdentifierRegistry, type IdOwner } from './store/identifierRegistry';
export * from './store/elementFactory';
export {
    createPathwayStore,
    getGroups,
    onStructureChange,
    type PathwayActions,
    type PathwayChange,
    type PathwayState,
    type PathwayStore,
    type PathwayStoreState,
    type RefOwner,
} from './store/pathwayStore';
export { applyGroupBounds, reconcileCoordinates } from './engine/coordinateReconciler';
export { GeometryContext, toAbsolute, toRelative, type Bounds } from './engine/geometry';
export {
    convertPathway,
    findLossyFeatures,
    normalizeDeprecatedShapes,
    type ConversionReport,
    type LossyFeature,
} from './engine/versionConverter';
export { AttributeTable, loadAttributeTable, type AttributeInfo } from './schema/attributeTable';
export { loadContentModel, loadSchemaResource, type ContentModel } from './schema/contentModel';
export { assertValidDocument, validateDocument, type ValidationResult } from './schema/schemaValidator';
export { parseColor, formatColor } from './io/colors';
export {
    bundledDataSources,
    createDataSourceResolver,
    defaultDataSourceResolver,
    type DataSource,
    type DataSourceResolver,
} from './io/dataSources';
export { parseXml, serializeXml, type XmlElement } from './io/xmlTree';
export {
    convertDocument,
    detectVersion,
    readPathway,
    readPathwayFile,
    readPathwayTree,
    writePathway,
    writePathwayDocument,
    writePathwayFile,
    type ConvertedDocument,
    type PathwayReadOptions,
    type PathwayWriteOptions,
} from './io/gpmlFormat';
