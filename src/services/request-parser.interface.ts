import { CandidateRequest } from '../types/request-parse.types';

export interface IRequestParser {
  parse(text: string): Promise<CandidateRequest>;
}
