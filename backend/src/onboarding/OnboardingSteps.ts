import { ONBOARDING_STEPS, type OnboardingStep } from "onboarding-common";

/**
 * Bit of a step inside the `completedSteps` column.
 */
export function stepBit(step: OnboardingStep): number {
	return 1 << ONBOARDING_STEPS.indexOf(step);
}

export function hasStep(completedSteps: number, step: OnboardingStep): boolean {
	return (completedSteps & stepBit(step)) !== 0;
}

/**
 * Step names in execution order.
 */
export function listSteps(completedSteps: number): Array<OnboardingStep> {
	return ONBOARDING_STEPS.filter(step => hasStep(completedSteps, step));
}
