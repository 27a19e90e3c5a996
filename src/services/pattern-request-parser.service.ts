import { injectable } from 'tsyringe';
import { CandidateRequest, ParsedRequestResponse, toCandidateRequest } from '../types/request-parse.types';
import { IRequestParser } from './request-parser.interface';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

@injectable()
export class PatternRequestParserService implements IRequestParser {
  private readonly portAliases: ReadonlyArray<[RegExp, string]> = [
    [/\b(durban|dbn)\b/i, 'DUR'],
    [/\b(richards\s*bay|rbay)\b/i, 'RCB'],
    [/\b(cape\s*town|cpt)\b/i, 'CPT'],
    [/\b(port\s*elizabeth|gqeberha)\b/i, 'PLZ'],
    [/\b(ngqura|coega)\b/i, 'NGQ'],
    [/\beast\s*london\b/i, 'ELS'],
    [/\bsaldanha(\s*bay)?\b/i, 'SDB'],
    [/\bmossel\s*bay\b/i, 'MZY']
  ];

  private readonly flagKeywords: ReadonlyArray<[RegExp, string, boolean | string]> = [
    [/\bcoaster\b/i, 'coaster', true],
    [/\bdouble[\s-]*hull(ed)?\b/i, 'double_hull_tanker', true],
    [/\b(outside\s+(ordinary\s+)?working\s+hours|after\s+hours)\b/i, 'outside_working_hours', true],
    [/\b(government|navy|naval)\b/i, 'government_vessel', true],
    [/\bbulk\s*carrier\b/i, 'vessel_type', 'bulk_carrier'],
    [/\bcontainer\s*(ship|vessel)\b/i, 'vessel_type', 'container'],
    [/\btanker\b/i, 'vessel_type', 'tanker'],
    [/\b(passenger|cruise)\b/i, 'vessel_type', 'passenger'],
    [/\bfishing\b/i, 'vessel_type', 'fishing'],
    [/\b(yacht|pleasure)\b/i, 'vessel_type', 'pleasure']
  ];

  async parse(text: string): Promise<CandidateRequest> {
    const parsed: ParsedRequestResponse = {
      port: this.findPort(text),
      grossTonnage: this.findGrossTonnage(text),
      ...this.findDates(text),
      flags: this.findFlags(text)
    };
    return toCandidateRequest(parsed);
  }

  private findPort(text: string): string | null {
    for (const [pattern, code] of this.portAliases) {
      if (pattern.test(text)) {
        return code;
      }
    }
    const explicitCode = text.match(/\bport\s+(?:of\s+)?([A-Z]{3})\b/);
    return explicitCode ? explicitCode[1] : null;
  }

  private findGrossTonnage(text: string): number | null {
    const match =
      text.match(/(\d[\d,]*(?:\.\d+)?)\s*(?:gt|grt|gross\s+ton(?:nage|s)?)\b/i) ??
      text.match(/\bgross\s+tonnage\s+(?:of\s+)?(\d[\d,]*(?:\.\d+)?)/i);
    if (!match) {
      return null;
    }
    const value = Number(match[1].replace(/,/g, ''));
    return Number.isFinite(value) ? value : null;
  }

  private findDates(text: string): Pick<ParsedRequestResponse, 'arrivalDate' | 'departureDate'> {
    const dates = text.match(/\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d{1,3})?)?(?:Z|[+-]\d{2}:\d{2}))?/g) ?? [];
    const arrivalDate = dates[0] ?? null;
    let departureDate = dates[1] ?? null;

    // "for 3 days" after a single date
    const stay = text.match(/\bfor\s+(\d+(?:\.\d+)?)\s*days?\b/i);
    if (arrivalDate && !departureDate && stay) {
      const arrival = Date.parse(arrivalDate.length === 10 ? `${arrivalDate}T00:00:00Z` : arrivalDate);
      if (!Number.isNaN(arrival)) {
        departureDate = new Date(arrival + Number(stay[1]) * MS_PER_DAY).toISOString();
      }
    }

    return { arrivalDate, departureDate };
  }

  private findFlags(text: string): Record<string, boolean | string> {
    const flags: Record<string, boolean | string> = {};
    for (const [pattern, flag, value] of this.flagKeywords) {
      if (flags[flag] === undefined && pattern.test(text)) {
        flags[flag] = value;
      }
    }
    return flags;
  }
}
