import type { UnitDefinition } from '@hexline/data';

import type { Unit } from '../types.js';

export const DEFAULT_ACTION_ORDER: readonly string[] = ['move', 'attack|capture'];

const POINT_BASED_ACTIONS: ReadonlySet<string> = new Set(['move', 'retreat']);

export function actionOrderFor(definition: UnitDefinition): readonly string[] {
  return definition.actionOrder.length > 0 ? definition.actionOrder : DEFAULT_ACTION_ORDER;
}

/** "attack|capture" -> ["attack", "capture"] */
export function parseActionAlternatives(step: string): string[] {
  return step.split('|').filter((action) => action !== '');
}

export function isPointBasedAction(action: string): boolean {
  return POINT_BASED_ACTIONS.has(action);
}

export function canPerformAction(unit: Unit, action: string): boolean {
  switch (action) {
    case 'move':
    case 'retreat':
      return unit.distanceLeft > 0;
    case 'attack':
    case 'capture':
    case 'build':
      return true;
    default:
      return false;
  }
}

function stepCandidates(unit: Unit, order: readonly string[], step: number): string[] {
  if (step >= order.length) return [];
  if (step === unit.progressionStep && unit.chosenAlternative !== '') return [unit.chosenAlternative];
  return parseActionAlternatives(order[step]);
}

export function getAllowedActionsForUnit(unit: Unit, definition: UnitDefinition): string[] {
  const order = actionOrderFor(definition);
  return stepCandidates(unit, order, unit.progressionStep).filter((action) => canPerformAction(unit, action));
}

/**
 * Step index at which `action` is legal right now, or undefined.
 * While the current step is point based, a non point-based action of the next step is
 * legal too; taking it forfeits the remaining budget.
 */
export function resolveActionStep(unit: Unit, definition: UnitDefinition, action: string): number | undefined {
  const order = actionOrderFor(definition);
  const current = stepCandidates(unit, order, unit.progressionStep);
  if (current.includes(action) && canPerformAction(unit, action)) return unit.progressionStep;

  if (isPointBasedAction(action) || !current.some(isPointBasedAction)) return undefined;
  const next = stepCandidates(unit, order, unit.progressionStep + 1);
  if (next.includes(action) && canPerformAction(unit, action)) return unit.progressionStep + 1;
  return undefined;
}

/**
 * Advances `unit` after it performed `action` in `step` (as returned by resolveActionStep).
 * Point-based actions complete their step once the budget is spent; every other action
 * completes it at once.
 */
export function advanceProgression(unit: Unit, definition: UnitDefinition, action: string, step: number): void {
  const order = actionOrderFor(definition);
  if (step > unit.progressionStep) {
    unit.progressionStep = step;
    unit.chosenAlternative = '';
    unit.distanceLeft = 0;
  }

  const completes = isPointBasedAction(action) ? unit.distanceLeft <= 0 : true;
  if (completes) {
    unit.progressionStep = step + 1;
    unit.chosenAlternative = '';
    if (action === 'attack' && order[unit.progressionStep] === 'retreat') {
      unit.distanceLeft = definition.retreatPoints;
    }
    return;
  }

  if (step < order.length && parseActionAlternatives(order[step]).length > 1) {
    unit.chosenAlternative = action;
  }
}

/** Outside the action order: a manual heal closes whatever step the unit is on. */
export function completeCurrentStep(unit: Unit): void {
  unit.progressionStep++;
  unit.chosenAlternative = '';
}
