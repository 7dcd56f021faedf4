/**
 * @iimkit/metadata
 *
 * IPTC metadata extraction
 *
 * Features:
 * - IIM record 2 scan and decode from any byte source
 * - Caption, credit, location and date attributes
 * - Keyword and supplemental category lists
 * - XML and SQL export
 */

export * from './iptc'
