export interface EligibilityProfile {
  cgpa: number | null;
  branch: string | null;
}

export interface EligibilityCriteria {
  min_cgpa: number | null;
  eligible_branches: string[] | null;
}

// A job without branch restrictions is open to every branch.
export const isEligible = (student: EligibilityProfile, job: EligibilityCriteria): boolean => {
  const branches = job.eligible_branches ?? [];
  return (student.cgpa ?? 0) >= (job.min_cgpa ?? 0) && (branches.length === 0 || branches.includes(student.branch ?? ''));
};

// Applications are accepted until the end of the deadline day.
export const isDeadlinePassed = (deadline: Date, now = new Date()): boolean => {
  const closesAt = new Date(deadline.getFullYear(), deadline.getMonth(), deadline.getDate() + 1);
  return now.getTime() >= closesAt.getTime();
};
