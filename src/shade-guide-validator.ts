import { formatRgb } from './color-space';
import type { ShadeGuideSet, ShadeTable } from './types';

export interface GuideIssue {
  systemId: string;
  label?: string;
  reason: string;
}

export interface GuideValidationResult {
  isValid: boolean;
  issues: GuideIssue[];
  summary: string;
}

export class ShadeGuideValidator {
  /**
   * Validate every reference table of a guide definition
   */
  static validate(guides: ShadeGuideSet): GuideValidationResult {
    const issues: GuideIssue[] = [];

    for (const table of guides.systems) {
      issues.push(...this.validateTable(table));
    }

    return {
      isValid: issues.length === 0,
      issues,
      summary: this.generateSummary(guides, issues)
    };
  }

  /**
   * A table must be non-empty, with unique labels and no two entries sharing a colour
   */
  static validateTable(table: ShadeTable): GuideIssue[] {
    const issues: GuideIssue[] = [];

    if (table.shades.length === 0) {
      issues.push({ systemId: table.id, reason: 'table has no shades' });
      return issues;
    }

    const seenLabels = new Set<string>();
    const seenColors = new Map<string, string>();

    for (const entry of table.shades) {
      if (seenLabels.has(entry.label)) {
        issues.push({ systemId: table.id, label: entry.label, reason: 'duplicate label' });
      }
      seenLabels.add(entry.label);

      const colorKey = formatRgb(entry.rgb);
      const firstLabel = seenColors.get(colorKey);
      if (firstLabel !== undefined) {
        issues.push({
          systemId: table.id,
          label: entry.label,
          reason: `same colour ${colorKey} as ${firstLabel}, it can never be matched`
        });
      } else {
        seenColors.set(colorKey, entry.label);
      }
    }

    return issues;
  }

  private static generateSummary(guides: ShadeGuideSet, issues: GuideIssue[]): string {
    const totalShades = guides.systems.reduce((sum, table) => sum + table.shades.length, 0);

    let summary = `Shade Guide Validation (version ${guides.version})\n`;
    summary += `Systems: ${guides.systems.length}\n`;
    summary += `Total shades: ${totalShades}\n`;
    summary += `Issues found: ${issues.length}\n`;

    if (issues.length > 0) {
      issues.forEach((issue, index) => {
        const where = issue.label ? `${issue.systemId}/${issue.label}` : issue.systemId;
        summary += `${index + 1}. ${where}: ${issue.reason}\n`;
      });
    } else {
      summary += `✅ All reference tables are usable\n`;
    }

    return summary;
  }
}
