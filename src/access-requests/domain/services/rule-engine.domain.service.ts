import { Injectable } from '@nestjs/common';
import { CatalogSnapshot } from '../../../catalog/domain/catalog-snapshot';
import { SoftwareModule } from '../../../catalog/domain/entities/software-module.entity';
import {
  DepartmentCode,
  UNRESTRICTED_DEPARTMENT,
} from '../../../catalog/domain/enums/department-code.enum';
import { AccessRequest } from '../entities/access-request.entity';
import { AccessRule } from '../enums/access-rule.enum';

/**
 * Phrases that mark a short justification as low effort. Matched as
 * substrings of the trimmed, lowercased text.
 */
export const LOW_EFFORT_PHRASES: readonly string[] = [
  'test',
  'asdf',
  'qwerty',
  'xxx',
  'n/a',
  'need access',
  'please',
  'urgent',
  'asap',
  'just because',
  'for work',
  'my boss said',
];

/**
 * A blacklisted phrase is tolerated once the justification reaches this length.
 */
export const MIN_LENGTH_WITH_LOW_EFFORT_PHRASE = 30;

export type RuleVerdict =
  | { outcome: 'HARD_REJECT'; rule: AccessRule; reason: string }
  | { outcome: 'DENY'; rule: AccessRule; reason: string }
  | { outcome: 'APPROVE' };

export interface RuleEvaluationInput {
  department: DepartmentCode;
  modules: SoftwareModule[];
  justification: string;
  /** Requester's ACTIVE, unexpired requests */
  footprint: AccessRequest[];
  snapshot: CatalogSnapshot;
  /** Set when the candidate renews this request */
  renewing?: AccessRequest;
}

type RuleCheck = (input: RuleEvaluationInput) => RuleVerdict | null;

function hardReject(rule: AccessRule, reason: string): RuleVerdict {
  return { outcome: 'HARD_REJECT', rule, reason };
}

function deny(rule: AccessRule, reason: string): RuleVerdict {
  return { outcome: 'DENY', rule, reason };
}

/**
 * Rule Engine Domain Service
 *
 * Pure function of a snapshot: no I/O, no clock. The first check that
 * returns a verdict wins and later checks are not evaluated.
 *
 * 1-4 reject malformed or structurally invalid requests (nothing is recorded).
 * 5-7 are business judgments recorded as DENIED requests.
 */
@Injectable()
export class RuleEngineDomainService {
  private readonly checks: ReadonlyArray<RuleCheck> = [
    (input) => this.checkDuplicateRequest(input),
    (input) => this.checkExistingAccess(input),
    (input) => this.checkJustificationQuality(input),
    (input) => this.checkModuleActivity(input),
    (input) => this.checkDepartmentCompatibility(input),
    (input) => this.checkMutualExclusion(input),
    (input) => this.checkQuota(input),
  ];

  evaluate(input: RuleEvaluationInput): RuleVerdict {
    for (const check of this.checks) {
      const verdict = check(input);
      if (verdict) {
        return verdict;
      }
    }
    return { outcome: 'APPROVE' };
  }

  /**
   * Modules subject to the duplicate/existing-access checks. A renewal
   * legitimately holds the modules of the request it renews.
   */
  private unwaivedModules(input: RuleEvaluationInput): SoftwareModule[] {
    const waived = new Set(input.renewing?.moduleIds ?? []);
    return input.modules.filter((module) => !waived.has(module.id));
  }

  /**
   * Footprint used for business judgments. The request being renewed is
   * superseded by the candidate and is left out.
   */
  private effectiveFootprint(input: RuleEvaluationInput): AccessRequest[] {
    const renewingId = input.renewing?.id;
    return input.footprint.filter((request) => request.id !== renewingId);
  }

  private checkDuplicateRequest(input: RuleEvaluationInput): RuleVerdict | null {
    const modules = this.unwaivedModules(input);
    if (modules.length === 0) {
      return null;
    }

    const covering = input.footprint.find((request) =>
      modules.every((module) => request.moduleIds.includes(module.id)),
    );
    if (!covering) {
      return null;
    }

    return hardReject(
      AccessRule.DUPLICATE_REQUEST,
      `Active request ${covering.protocol} already covers the requested modules`,
    );
  }

  private checkExistingAccess(input: RuleEvaluationInput): RuleVerdict | null {
    for (const module of this.unwaivedModules(input)) {
      const holder = input.footprint.find((request) =>
        request.moduleIds.includes(module.id),
      );
      if (holder) {
        return hardReject(
          AccessRule.EXISTING_ACCESS,
          `Requester already has active access to module '${module.name}' (${holder.protocol})`,
        );
      }
    }
    return null;
  }

  private checkJustificationQuality(
    input: RuleEvaluationInput,
  ): RuleVerdict | null {
    const normalized = input.justification.trim().toLowerCase();
    if (normalized.length >= MIN_LENGTH_WITH_LOW_EFFORT_PHRASE) {
      return null;
    }

    const phrase = LOW_EFFORT_PHRASES.find((candidate) =>
      normalized.includes(candidate),
    );
    if (!phrase) {
      return null;
    }

    return hardReject(
      AccessRule.JUSTIFICATION_QUALITY,
      `Justification is insufficient: describe the business need in at least ${MIN_LENGTH_WITH_LOW_EFFORT_PHRASE} characters`,
    );
  }

  private checkModuleActivity(input: RuleEvaluationInput): RuleVerdict | null {
    const inactive = input.modules.find(
      (module) => !input.snapshot.isActive(module),
    );
    if (!inactive) {
      return null;
    }
    return hardReject(
      AccessRule.MODULE_INACTIVE,
      `Module '${inactive.name}' is inactive and cannot be requested`,
    );
  }

  private checkDepartmentCompatibility(
    input: RuleEvaluationInput,
  ): RuleVerdict | null {
    if (input.department === UNRESTRICTED_DEPARTMENT) {
      return null;
    }

    const offending = input.modules.find(
      (module) => !module.allowedDepartments.includes(input.department),
    );
    if (!offending) {
      return null;
    }

    return deny(
      AccessRule.DEPARTMENT_INCOMPATIBLE,
      `Module '${offending.name}' is not available to the ${input.department} department`,
    );
  }

  private checkMutualExclusion(input: RuleEvaluationInput): RuleVerdict | null {
    const footprint = this.effectiveFootprint(input);

    for (const module of input.modules) {
      for (const request of footprint) {
        const conflicting = request.moduleIds.find((heldId) =>
          input.snapshot.areIncompatible(module.id, heldId),
        );
        if (conflicting !== undefined) {
          return deny(
            AccessRule.MUTUALLY_EXCLUSIVE,
            `Module '${module.name}' is incompatible with active module '${input.snapshot.moduleName(conflicting)}'`,
          );
        }
      }
    }

    const [pair] = input.snapshot.incompatiblePairs(input.modules);
    if (pair) {
      return deny(
        AccessRule.MUTUALLY_EXCLUSIVE,
        `Modules '${pair[0].name}' and '${pair[1].name}' cannot be held together`,
      );
    }

    return null;
  }

  private checkQuota(input: RuleEvaluationInput): RuleVerdict | null {
    const quota = input.snapshot.quotaFor(input.department);
    // A module held through more than one request counts once
    const activeCount = new Set(
      this.effectiveFootprint(input).flatMap((request) => request.moduleIds),
    ).size;
    const requested = input.modules.length;

    if (activeCount + requested <= quota) {
      return null;
    }

    return deny(
      AccessRule.QUOTA_EXCEEDED,
      `Module quota exceeded for the ${input.department} department: ${activeCount} active + ${requested} requested exceeds the limit of ${quota}`,
    );
  }
}
