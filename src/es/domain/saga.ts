import { Tagged } from "./decider";

/**
 * Pure reaction: an action result (usually an event) maps to follow-up
 * actions (usually commands). Results outside `actionResultTypes` are ignored.
 */
export interface Saga<AR extends Tagged, A extends Tagged> {
  readonly actionResultTypes: readonly AR["type"][];
  react(actionResult: AR): readonly A[];
}

export function combineSagas<
  AR1 extends Tagged,
  A1 extends Tagged,
  AR2 extends Tagged,
  A2 extends Tagged,
>(left: Saga<AR1, A1>, right: Saga<AR2, A2>): Saga<AR1 | AR2, A1 | A2> {
  const leftTypes = new Set<string>(left.actionResultTypes);
  const rightTypes = new Set<string>(right.actionResultTypes);
  const isLeft = (ar: AR1 | AR2): ar is AR1 => leftTypes.has(ar.type);
  const isRight = (ar: AR1 | AR2): ar is AR2 => rightTypes.has(ar.type);

  const actionResultTypes: (AR1 | AR2)["type"][] = [
    ...left.actionResultTypes,
    ...right.actionResultTypes,
  ];

  return {
    actionResultTypes,
    react(actionResult) {
      const out: (A1 | A2)[] = [];
      if (isLeft(actionResult)) out.push(...left.react(actionResult));
      if (isRight(actionResult)) out.push(...right.react(actionResult));
      return out;
    },
  };
}
