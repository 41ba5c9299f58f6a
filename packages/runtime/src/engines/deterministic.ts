// Deterministic engine - stable, hash-derived results for development and tests
//
// The same request always yields the same result. Values look plausible
// for the agent type but carry no clinical meaning.

import { createHash } from 'node:crypto';
import type { JsonObject } from '@carechain/protocol';
import { canonicalJsonStringify } from '../hash.js';
import type { AnalysisEngine, AnalysisRequest, AnalysisResult } from './types.js';

const RISK_LEVELS = ['low', 'medium', 'high', 'critical'] as const;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function digestOf(request: AnalysisRequest): Buffer {
  return createHash('sha256')
    .update(
      canonicalJsonStringify({
        agentType: request.agentType,
        caseSession: request.caseSession,
        input: request.input,
        upstream: request.upstream.map((u) => u.analysisId),
      })
    )
    .digest();
}

function outputFor(agentType: string, digest: Buffer, confidence: number): JsonObject {
  switch (agentType) {
    case 'image_analysis':
      return { grade: digest[1] % 5, confidence };
    case 'risk_assessment': {
      const riskPercentage = round2(digest[2] / 255);
      return {
        risk_percentage: riskPercentage,
        risk_level: RISK_LEVELS[Math.min(3, Math.floor(riskPercentage * 4))],
      };
    }
    case 'clinical_assessment':
    case 'diagnostic':
      return { primary_diagnosis: `finding_${digest[3] % 8}`, confidence };
    default:
      return { status: 'reviewed', confidence };
  }
}

export function createDeterministicEngine(): AnalysisEngine {
  return {
    name: 'deterministic',

    async analyze(request: AnalysisRequest): Promise<AnalysisResult> {
      const digest = digestOf(request);
      // 0.50 .. 1.00
      const confidence = round2(0.5 + digest[0] / 510);

      return {
        status: 'completed',
        outputSnapshot: outputFor(request.agentType, digest, confidence),
        confidenceScores: { overall: confidence },
        evidenceReferences: [
          `${request.agentType}:${digest.subarray(4, 8).toString('hex')}`,
          ...request.upstream.map((u) => `analysis:${u.analysisId}`),
        ],
      };
    },
  };
}
