import { Injectable } from '@nestjs/common';

const IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*(?:\.[a-zA-Z_][a-zA-Z0-9_]*)*$/;

/**
 * Salesforce Query Sanitizer
 * Escapes SOQL literals and validates names spliced into queries
 */
@Injectable()
export class SoqlSanitizer {
  /**
   * Validate Salesforce ID format (15 or 18 char alphanumeric)
   */
  validateId(id: string): boolean {
    if (!id) return false;
    return /^[a-zA-Z0-9]{15}(?:[a-zA-Z0-9]{3})?$/.test(id);
  }

  /** Field or relationship path, e.g. `Owner.Name` */
  validateFieldName(field: string): boolean {
    return IDENTIFIER.test(field);
  }

  /**
   * Escape SOQL reserved characters in field values
   */
  sanitizeFieldValue(value: string): string {
    if (!value) return '';
    return value
      .replace(/\\/g, '\\\\')
      .replace(/'/g, "\\'")
      .replace(/"/g, '\\"')
      .replace(/\n/g, '\\n')
      .replace(/\r/g, '\\r')
      .replace(/\t/g, '\\t');
  }

  buildSelect(fields: string[], objectType: string): string {
    const invalid = fields.filter((f) => !this.validateFieldName(f));
    if (invalid.length > 0) {
      throw new Error(`Invalid field name: ${invalid.join(', ')}`);
    }
    if (!/^[a-zA-Z_][a-zA-Z0-9_]*$/.test(objectType)) {
      throw new Error(`Invalid object type: ${objectType}`);
    }
    return `SELECT ${fields.join(', ')} FROM ${objectType}`;
  }

  /**
   * Build safe SOQL WHERE clause
   */
  buildFilterClause(
    field: string,
    operator: string,
    value: string | string[],
  ): string {
    if (!this.validateFieldName(field)) {
      throw new Error(`Invalid field name: ${field}`);
    }

    if (operator === 'IN' && Array.isArray(value)) {
      const safeValues = value
        .map((v) => `'${this.sanitizeFieldValue(v)}'`)
        .join(', ');
      return `${field} IN (${safeValues})`;
    }

    const safeValue = this.sanitizeFieldValue(String(value));
    return `${field} ${operator} '${safeValue}'`;
  }
}
