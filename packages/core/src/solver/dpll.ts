/**
 * DPLL satisfiability search with two-watched-literal propagation.
 * @packageDocumentation
 */

import type { Clause, Literal } from '../types'
import { InvariantError } from '../types'
import { Deadline } from './deadline'

/**
 * Chooses the first value tried for a decision variable:
 * `true` tries "selected" first.
 *
 * @public
 */
export type PolarityPolicy = (variable: number) => boolean

/**
 * Tries "unselected" first, so smaller configurations are found first.
 * @public
 */
export const preferUnselected: PolarityPolicy = () => false

/**
 * Counters describing the work a solver has done.
 * @public
 */
export interface SolverStats {
  decisions: number
  propagations: number
  conflicts: number
  models: number
}

/**
 * One decision level: the literal decided (or assumed) there.
 */
interface DecisionEntry {
  readonly literal: Literal
  /** The opposite branch has already been explored */
  readonly flipped: boolean
  /** Assumptions are never flipped */
  readonly assumption: boolean
}

/**
 * A complete DPLL solver over a fixed set of variables.
 *
 * Decisions pick the lowest-numbered unassigned variable, so searches are
 * deterministic for a given clause set, assumption list and polarity policy.
 * Clauses can be added between searches (e.g. blocking clauses).
 *
 * @public
 */
export class DpllSolver {
  readonly variableCount: number
  readonly stats: SolverStats = { decisions: 0, propagations: 0, conflicts: 0, models: 0 }

  private readonly clauses: Literal[][] = []
  private readonly watches: number[][]
  private readonly values: Int8Array
  private readonly trail: Literal[] = []
  private readonly levelStarts: number[] = []
  private readonly decisions: DecisionEntry[] = []
  private head = 0
  private inconsistent = false

  /**
   * @param variableCount - Number of variables; literals range over ±1..variableCount
   * @param clauses - Initial clauses
   */
  constructor(variableCount: number, clauses: readonly Clause[] = []) {
    this.variableCount = variableCount
    this.values = new Int8Array(variableCount + 1)
    this.watches = Array.from({ length: 2 * (variableCount + 1) }, () => [])
    for (const clause of clauses) {
      this.addClause(clause)
    }
  }

  /** Whether the clauses are known to be unsatisfiable without assumptions */
  get isInconsistent(): boolean {
    return this.inconsistent
  }

  /**
   * Add a clause. Any search in progress is abandoned.
   *
   * @throws InvariantError if a literal is outside the declared variables
   */
  addClause(clause: Clause): void {
    this.backtrackTo(0)
    if (this.inconsistent) return

    const literals: Literal[] = []
    for (const literal of clause) {
      this.checkLiteral(literal)
      const value = this.valueOf(literal)
      if (value === 1) return // satisfied at the root
      if (value === 0 && !literals.includes(literal)) literals.push(literal)
    }

    if (literals.length === 0) {
      this.inconsistent = true
      return
    }

    if (literals.length === 1) {
      this.enqueue(literals[0])
      if (!this.propagate()) this.inconsistent = true
      return
    }

    const index = this.clauses.length
    this.clauses.push(literals)
    this.watches[code(literals[0])].push(index)
    this.watches[code(literals[1])].push(index)
  }

  /**
   * Find one satisfying assignment under the given assumptions.
   *
   * @param assumptions - Literals forced true for this search only
   * @param polarity - First value tried per decision
   * @param deadline - Checked at each decision
   * @returns Truth values indexed by variable (1 selected, -1 unselected), or undefined if unsatisfiable
   * @throws AnalysisTimeoutError when the deadline passes
   */
  solve(
    assumptions: readonly Literal[] = [],
    polarity: PolarityPolicy = preferUnselected,
    deadline: Deadline = Deadline.none,
  ): Int8Array | undefined {
    const search = this.search(assumptions, polarity, deadline)
    const first = search.next()
    search.return(undefined)
    return first.done ? undefined : first.value
  }

  /**
   * Enumerate every satisfying assignment under the given assumptions.
   *
   * Each assignment is yielded once, in the order the decision tree is
   * walked. The generator must be finished or discarded before the solver
   * is used for anything else.
   *
   * @throws AnalysisTimeoutError when the deadline passes
   */
  *search(
    assumptions: readonly Literal[] = [],
    polarity: PolarityPolicy = preferUnselected,
    deadline: Deadline = Deadline.none,
  ): Generator<Int8Array, void, undefined> {
    this.backtrackTo(0)
    if (this.inconsistent) return

    for (const literal of assumptions) {
      this.checkLiteral(literal)
      const value = this.valueOf(literal)
      if (value === -1) {
        this.backtrackTo(0)
        return
      }
      if (value === 1) continue

      this.openLevel({ literal, flipped: false, assumption: true })
      if (!this.propagate()) {
        this.backtrackTo(0)
        return
      }
    }

    const base = this.decisions.length
    let conflict = false

    while (true) {
      if (conflict) {
        this.stats.conflicts++
        if (!this.flipLastDecision(base)) {
          this.backtrackTo(0)
          return
        }
        conflict = !this.propagate()
        continue
      }

      deadline.check()

      const variable = this.pickBranchVariable()
      if (variable === 0) {
        this.stats.models++
        yield this.values.slice()
        if (!this.flipLastDecision(base)) {
          this.backtrackTo(0)
          return
        }
        conflict = !this.propagate()
        continue
      }

      this.stats.decisions++
      const literal = polarity(variable) ? variable : -variable
      this.openLevel({ literal, flipped: false, assumption: false })
      conflict = !this.propagate()
    }
  }

  /**
   * Value of a literal under the current assignment: 1 true, -1 false, 0 unassigned.
   */
  private valueOf(literal: Literal): number {
    const value = this.values[Math.abs(literal)]
    return literal > 0 ? value : -value
  }

  private enqueue(literal: Literal): void {
    this.values[Math.abs(literal)] = literal > 0 ? 1 : -1
    this.trail.push(literal)
  }

  private openLevel(entry: DecisionEntry): void {
    this.levelStarts.push(this.trail.length)
    this.decisions.push(entry)
    this.enqueue(entry.literal)
  }

  /**
   * Undo every level above `level`.
   */
  private backtrackTo(level: number): void {
    if (this.decisions.length <= level) return

    const start = this.levelStarts[level]
    for (let i = this.trail.length - 1; i >= start; i--) {
      this.values[Math.abs(this.trail[i])] = 0
    }
    this.trail.length = start
    this.levelStarts.length = level
    this.decisions.length = level
    this.head = start
  }

  /**
   * Undo levels until a decision whose other branch is unexplored, and take
   * that branch. Returns false when the search space above `base` is exhausted.
   */
  private flipLastDecision(base: number): boolean {
    while (this.decisions.length > base) {
      const level = this.decisions.length - 1
      const entry = this.decisions[level]
      this.backtrackTo(level)
      if (!entry.flipped && !entry.assumption) {
        this.openLevel({ literal: -entry.literal, flipped: true, assumption: false })
        return true
      }
    }
    return false
  }

  private pickBranchVariable(): number {
    for (let variable = 1; variable <= this.variableCount; variable++) {
      if (this.values[variable] === 0) return variable
    }
    return 0
  }

  /**
   * Unit propagation over the watched literals. Returns false on conflict.
   */
  private propagate(): boolean {
    while (this.head < this.trail.length) {
      const falseLiteral = -this.trail[this.head++]
      const watchList = this.watches[code(falseLiteral)]
      this.stats.propagations++

      let i = 0
      while (i < watchList.length) {
        const index = watchList[i]
        const clause = this.clauses[index]

        // Keep the false literal in slot 1.
        if (clause[0] === falseLiteral) {
          clause[0] = clause[1]
          clause[1] = falseLiteral
        }

        if (this.valueOf(clause[0]) === 1) {
          i++
          continue
        }

        let moved = false
        for (let k = 2; k < clause.length; k++) {
          if (this.valueOf(clause[k]) !== -1) {
            clause[1] = clause[k]
            clause[k] = falseLiteral
            this.watches[code(clause[1])].push(index)
            watchList[i] = watchList[watchList.length - 1]
            watchList.pop()
            moved = true
            break
          }
        }
        if (moved) continue

        if (this.valueOf(clause[0]) === -1) {
          return false
        }

        this.enqueue(clause[0])
        i++
      }
    }
    return true
  }

  private checkLiteral(literal: Literal): void {
    const variable = Math.abs(literal)
    if (!Number.isInteger(literal) || variable < 1 || variable > this.variableCount) {
      throw new InvariantError(`Literal ${literal} is outside variables 1..${this.variableCount}`)
    }
  }
}

/**
 * Watch-list slot of a literal.
 */
function code(literal: Literal): number {
  return literal > 0 ? literal * 2 : -literal * 2 + 1
}

/**
 * Evaluate clauses under a total assignment.
 *
 * @param clauses - Clauses to check
 * @param values - Truth values indexed by variable (positive = selected)
 * @returns Whether every clause has a true literal
 *
 * @public
 */
export function satisfiesAll(clauses: readonly Clause[], values: ArrayLike<number>): boolean {
  return clauses.every((clause) =>
    clause.some((literal) => (literal > 0 ? values[literal] > 0 : values[-literal] <= 0)),
  )
}
