/**
 * DNS propagation: ask a set of public resolvers the same question and
 * measure how many of them agree with the expected answer.
 */
import { performance } from "node:perf_hooks";
import { PROPAGATION_WARNING_RATIO } from "../../constants/defaults";
import type { ResolverInfo } from "../../constants/public-resolvers";
import { WorkerPool } from "../../engine/worker-pool";
import type { OutcomeKind } from "../../outcome";
import { failureMessage } from "../deadline";
import { dnsErrorCode, type DnsQuerier, type DnsRecordType } from "./dns-querier";

export interface ResolverAnswer {
  resolver: string;
  name: string;
  provider: string;
  status: "success" | "error";
  responseTimeMs: number;
  records?: string[];
  error?: string;
  /** Answer contains every expected value (any answer when none expected) */
  match: boolean;
}

export interface PropagationReport {
  status: OutcomeKind;
  totalCount: number;
  successfulCount: number;
  consistentCount: number;
  percentage: number;
  threshold: number;
  resolvers: ResolverAnswer[];
}

export interface PropagationQuery {
  name: string;
  recordType: DnsRecordType;
  expected: readonly string[];
  resolvers: readonly ResolverInfo[];
  threshold: number;
  timeoutMs: number;
  maxWorkers: number;
  signal: AbortSignal;
}

export function containsExpected(records: readonly string[], expected: readonly string[]): boolean {
  return expected.every((value) => records.includes(value));
}

/**
 * Percentage of resolvers with a matching answer, rounded to one decimal,
 * and the status it earns against the threshold.
 */
export function evaluatePropagation(
  answers: readonly ResolverAnswer[],
  threshold: number,
): PropagationReport {
  const totalCount = answers.length;
  const successfulCount = answers.filter((answer) => answer.status === "success").length;
  const consistentCount = answers.filter((answer) => answer.match).length;
  const percentage = totalCount > 0 ? (consistentCount / totalCount) * 100 : 0;

  let status: OutcomeKind = "error";
  if (percentage >= threshold) status = "success";
  else if (percentage >= threshold * PROPAGATION_WARNING_RATIO) status = "warning";

  return {
    status,
    totalCount,
    successfulCount,
    consistentCount,
    percentage: Math.round(percentage * 10) / 10,
    threshold,
    resolvers: [...answers],
  };
}

export async function checkPropagation(querier: DnsQuerier, query: PropagationQuery): Promise<PropagationReport> {
  const pool = new WorkerPool(query.maxWorkers);
  try {
    const answers = await Promise.all(
      query.resolvers.map((resolver) => pool.submit(() => askResolver(querier, query, resolver))),
    );
    return evaluatePropagation(answers, query.threshold);
  } finally {
    pool.close();
  }
}

async function askResolver(
  querier: DnsQuerier,
  query: PropagationQuery,
  resolver: ResolverInfo,
): Promise<ResolverAnswer> {
  const started = performance.now();
  const base = { resolver: resolver.ip, name: resolver.name, provider: resolver.provider };
  try {
    const records = await querier.query({
      name: query.name,
      recordType: query.recordType,
      servers: [resolver.ip],
      timeoutMs: query.timeoutMs,
      signal: query.signal,
    });
    return {
      ...base,
      status: "success",
      responseTimeMs: performance.now() - started,
      records,
      match: containsExpected(records, query.expected),
    };
  } catch (err) {
    return {
      ...base,
      status: "error",
      responseTimeMs: performance.now() - started,
      error: dnsErrorCode(err) ?? failureMessage(err),
      match: false,
    };
  }
}
