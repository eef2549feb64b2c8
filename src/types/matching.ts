/**
 * TypeScript interfaces for the matching engine
 *
 * Profiles arrive already vectorised and fact-extracted; results are plain
 * data so the service layer can serialise them as-is.
 */

export type Vector = readonly number[];

export type ExperienceLevel = 'junior' | 'mid' | 'senior';

export type EducationLevel =
    | 'none'
    | 'high_school'
    | 'associate'
    | 'bachelor'
    | 'master'
    | 'doctorate';

export type RequirementPriority = 'required' | 'preferred';

export type Category =
    | 'required'
    | 'preferred'
    | 'experience'
    | 'overall'
    | 'education'
    | 'certification';

export type PenaltyKind =
    | 'experience_level_mismatch'
    | 'experience_significantly_lacking'
    | 'domain_mismatch'
    | 'role_mismatch'
    | 'required_skill_missing'
    | 'required_skill_critical_missing';

export interface SkillToken {
    canonical: string;
    aliases: readonly string[];
}

// Position side

interface RequirementItemBase {
    id: string;
    vector: Vector;
    priority: RequirementPriority;
    critical?: boolean;
}

export interface SkillRequirementItem extends RequirementItemBase {
    kind: 'skill';
    token: string;
}

export interface SentenceRequirementItem extends RequirementItemBase {
    kind: 'sentence';
    text: string;
}

export type RequirementItem = SkillRequirementItem | SentenceRequirementItem;

export interface PositionProfile {
    id: string;
    vectors: {
        overall?: Vector;
        required?: Vector;
        preferred?: Vector;
        description?: Vector;
    };
    requirements: RequirementItem[];
    experience: {
        minYears: number;
        maxYears?: number;
        level?: ExperienceLevel;
    };
    domainTags: string[];
    role?: string;
    education?: { minimumLevel: EducationLevel };
    certifications?: string[];
}

// Candidate side

export interface CandidateSentence {
    id: string;
    text: string;
    vector: Vector;
}

export interface CandidateSkill {
    id: string;
    token: string;
    text: string; // narrative context the skill was extracted from
    vector: Vector;
}

export interface CandidateProfile {
    id: string;
    vectors: {
        overall?: Vector;
        skills?: Vector;
        experience?: Vector;
        projects?: Vector;
    };
    sentences: CandidateSentence[];
    skills: CandidateSkill[];
    experienceYears: number;
    level?: ExperienceLevel;
    domainTags: string[];
    roles?: string[];
    educationLevel?: EducationLevel;
    certifications?: string[];
}

// Results

export type ItemStatus = 'matched' | 'near_miss' | 'unmatched';

export type MatchType = 'lexical' | 'semantic' | 'none';

export interface VetoRecord {
    candidateItemId: string;
    candidateToken: string;
    candidateGroup: string;
    similarity: number;
}

export interface ItemMatch {
    itemId: string;
    kind: RequirementItem['kind'];
    label: string;
    critical: boolean;
    weight: number;
    status: ItemStatus;
    matched: boolean;
    matchType: MatchType;
    similarity: number;
    threshold: number;
    token: string | null;
    conflictGroup: string | null;
    matchedCandidateItemId: string | null;
    vetoed: VetoRecord[];
    error?: 'malformed_item';
}

export interface SectionResult {
    section: RequirementPriority;
    score: number;
    items: ItemMatch[];
    matched: string[];
    missing: string[];
    nearMisses: string[];
    missingSection: boolean;
    narrativeSimilarity: number | null;
}

export type ExperienceFlag = 'level_mismatch' | 'significantly_lacking';

export interface ExperienceResult {
    score: number;
    flags: ExperienceFlag[];
    requiredMinYears: number;
    requiredMaxYears: number | null;
    candidateYears: number;
    requiredLevel: ExperienceLevel | null;
    candidateLevel: ExperienceLevel;
    levelDistance: number | null;
    narrativeSimilarity: number | null;
}

export interface EducationResult {
    score: number;
    requiredLevel: EducationLevel | null;
    candidateLevel: EducationLevel | null;
}

export interface CertificationResult {
    score: number;
    matched: string[];
    missing: string[];
}

export type MatchFlag =
    | 'required_section_missing'
    | 'preferred_section_missing'
    | 'overall_vector_missing'
    | 'education_missing'
    | 'malformed_items';

export type PenaltyMap = Partial<Record<PenaltyKind, number>>;

export type CategoryScores = Record<Category, { score: number; weight: number }>;

export interface MatchResult {
    candidateId: string;
    positionId: string;
    overallScore: number; // 0–100, one decimal
    grade: string;
    categoryScores: CategoryScores;
    sections: {
        required: SectionResult;
        preferred: SectionResult;
    };
    experience: ExperienceResult;
    education: EducationResult;
    certification: CertificationResult;
    penalties: PenaltyMap;
    flags: MatchFlag[];
    configVersion: string;
    calculatedAt: number;
}

// Fast stage

export interface ScreeningCandidate {
    id: string;
    vector?: Vector;
}

export interface ScreeningScore {
    candidateId: string;
    score: number;
}

/** Why a candidate has no screening score: a wrong-sized vector, or its chunk never finished. */
export type ScreeningErrorReason = 'dimension_mismatch' | 'chunk_failed';

export interface ScreeningError {
    candidateId: string;
    reason: ScreeningErrorReason;
    message: string;
}

export interface ScreeningOptions {
    limit?: number;
    minSimilarity?: number;
    nearMissMargin?: number;
}

export interface ScreeningResult {
    positionId: string;
    shortlist: ScreeningScore[];
    nearMisses: ScreeningScore[];
    errors: ScreeningError[];
    totalCandidates: number;
}
