import { CONSTANTS, formatMm } from "../constants/commonConstants.js";
import type { CutDescriptorSet } from "../types/imposition.js";
import { padSheetNumber } from "./layout.js";

export interface CuttingGuideOptions {
    /** Job start stamp; End is CUTTING_JOB_MINUTES later. */
    now?: Date;
}

const MEDIA_ID = 'Media_001';
const CUTTING_PARAMS_ID = 'CuttingParams_001';

/** UTC stamp to the second, without a zone designator. */
function formatStamp(date: Date): string {
    return date.toISOString().slice(0, 19);
}

function attrs(values: Record<string, string>): string {
    return Object.entries(values)
        .map(([key, value]) => `${key}="${escapeXml(value)}"`)
        .join(' ');
}

/**
 * Builds a JDF 1.3 cutting job for one sheet: the media declaration, a
 * CardSheet cut block with one CutContour mark per card, node timing and the
 * links from the process to both resources.
 */
export function buildCuttingGuideXml(guide: CutDescriptorSet, options: CuttingGuideOptions = {}): string {
    const start = options.now ?? new Date();
    const end = new Date(start.getTime() + CONSTANTS.CUTTING_JOB_MINUTES * 60_000);
    const paperSize = `${formatMm(guide.paperWidthMm)} ${formatMm(guide.paperHeightMm)}`;

    const xmlLines = [
        '<?xml version="1.0" encoding="utf-8"?>',
        `<JDF ${attrs({
            Type: 'ProcessGroup',
            Types: 'Cutting',
            ID: `Sheet_${padSheetNumber(guide.sheetIndex)}_Cutting`,
            Status: 'Waiting',
            Version: '1.3',
        })}>`,
        '  <ResourcePool>',
        `    <Media ${attrs({
            ID: MEDIA_ID,
            Class: 'Consumable',
            Status: 'Available',
            MediaType: 'Paper',
            Dimension: paperSize,
            Unit: 'mm',
        })}/>`,
        `    <CuttingParams ${attrs({ ID: CUTTING_PARAMS_ID, Class: 'Parameter', Status: 'Available' })}>`,
        `      <CutBlock ${attrs({ BlockName: 'CardSheet', TrimSize: paperSize, Unit: 'mm' })}>`,
    ];

    guide.cuts.forEach((cut) => {
        xmlLines.push(`        <CutMark ${attrs({
            MarkType: 'CutContour',
            Center: `${formatMm(cut.centerX)} ${formatMm(cut.centerY)}`,
            Size: `${formatMm(cut.widthMm)} ${formatMm(cut.heightMm)}`,
            Unit: 'mm',
        })}>`);
        xmlLines.push('          <CutPath>');
        xmlLines.push(`            <Rectangle ${attrs({
            LLx: formatMm(cut.llx),
            LLy: formatMm(cut.lly),
            URx: formatMm(cut.urx),
            URy: formatMm(cut.ury),
            Unit: 'mm',
        })}/>`);
        xmlLines.push('          </CutPath>');
        xmlLines.push('        </CutMark>');
    });

    xmlLines.push('      </CutBlock>');
    xmlLines.push('    </CuttingParams>');
    xmlLines.push('  </ResourcePool>');
    xmlLines.push(`  <NodeInfo ${attrs({ NodeStatus: 'Waiting', Start: formatStamp(start), End: formatStamp(end) })}/>`);
    xmlLines.push('  <ResourceLinkPool>');
    xmlLines.push(`    <MediaLink ${attrs({ Usage: 'Input', rRef: MEDIA_ID })}/>`);
    xmlLines.push(`    <CuttingParamsLink ${attrs({ Usage: 'Input', rRef: CUTTING_PARAMS_ID })}/>`);
    xmlLines.push('  </ResourceLinkPool>');
    xmlLines.push('</JDF>');

    return xmlLines.join('\n') + '\n';
}

/**
 * Escapes special XML characters.
 */
export function escapeXml(str: string): string {
    return str
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');
}
