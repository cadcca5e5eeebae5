/**
 * Interactive explorer: main menu, actor browser with the technique pager,
 * and tool browser.
 *
 * Error notices raised while handling input are held back and printed under
 * the next screen that gets drawn, because most transitions clear the
 * terminal first.
 */

import chalk from 'chalk';

import { getActorId, getAllThreatActors, getTechniquesForActor } from '../knowledge/mitre-attack/actors.js';
import type { ActorClassifier } from '../knowledge/mitre-attack/classifier.js';
import type { AttackKnowledgeBase } from '../knowledge/mitre-attack/loader.js';
import { getActorsForTool, getTechniquesForTool, loadTools } from '../knowledge/mitre-attack/tools.js';
import { buildActorGrid, renderActorGrid } from '../reporting/actor-grid.js';
import { renderTechniquePage } from '../reporting/technique-table.js';
import { renderTitleScreen } from '../reporting/title-screen.js';
import { renderToolList, renderToolPanel } from '../reporting/tool-panel.js';
import type { ActorTechnique, ThreatActor, Tool } from '../types/threat-intel.js';
import { createLogger } from '../utils/logger.js';
import type { Prompter, Screen } from './io.js';
import {
  ACTOR_MENU,
  BACK_TO_MAIN_MENU,
  MAIN_MENU,
  MENU_MESSAGE,
  MESSAGES,
  pageCount,
  pageSlice,
  pagerPrompt,
  parseSelection,
  resolvePagerInput,
} from './navigation.js';

const log = createLogger('session');

export interface SessionDependencies {
  kb: AttackKnowledgeBase;
  classifier: ActorClassifier;
  prompter: Prompter;
  screen: Screen;
  pageSize: number;
  /** Title screen text; defaults to the banner + app title. */
  titleScreen?: string;
}

export type ActorBrowseOutcome = 'exit' | 'done';

export class ExplorerSession {
  private readonly kb: AttackKnowledgeBase;
  private readonly classifier: ActorClassifier;
  private readonly prompter: Prompter;
  private readonly screen: Screen;
  private readonly pageSize: number;
  private readonly titleScreen: string | undefined;

  private actors: ThreatActor[] | undefined;
  private tools: Tool[] | undefined;
  private notice: string | undefined;

  constructor(deps: SessionDependencies) {
    this.kb = deps.kb;
    this.classifier = deps.classifier;
    this.prompter = deps.prompter;
    this.screen = deps.screen;
    this.pageSize = deps.pageSize;
    this.titleScreen = deps.titleScreen;
  }

  // -----------------------------------------------------------------------
  // Entry points
  // -----------------------------------------------------------------------

  /** Main menu loop: Threat Actors / Tools / Exit. */
  async run(): Promise<void> {
    for (;;) {
      this.showTitle();
      const choice = await this.prompter.select(MENU_MESSAGE, [MAIN_MENU.actors, MAIN_MENU.tools, MAIN_MENU.exit]);

      if (choice === MAIN_MENU.exit) return;
      if (choice === MAIN_MENU.actors) {
        await this.browseActors(BACK_TO_MAIN_MENU);
      } else if (choice === MAIN_MENU.tools) {
        await this.browseTools();
      }
    }
  }

  /** Actor browser on its own; its menu ends with Exit. */
  async runActors(): Promise<void> {
    for (;;) {
      this.showTitle();
      if ((await this.browseActors(MAIN_MENU.exit)) === 'exit') return;
    }
  }

  /** Tool browser on its own. */
  async runTools(): Promise<void> {
    this.screen.clear();
    await this.browseTools();
  }

  // -----------------------------------------------------------------------
  // Actors
  // -----------------------------------------------------------------------

  /**
   * One pass through the actor menu: pick a grouping, pick an actor, page
   * through its techniques. Returns 'exit' when `exitLabel` was chosen.
   */
  async browseActors(exitLabel: string): Promise<ActorBrowseOutcome> {
    const choice = await this.prompter.select(MENU_MESSAGE, [...ACTOR_MENU.map((entry) => entry.label), exitLabel]);
    const entry = ACTOR_MENU.find((item) => item.label === choice);
    if (!entry) return 'exit';

    const grid = buildActorGrid(this.getActors(), entry.dimension);
    this.screen.print(renderActorGrid(grid, this.screen.width));

    const index = parseSelection(await this.prompter.input(MESSAGES.actorPrompt), grid.order.length);
    if (index === undefined) {
      this.notice = MESSAGES.invalidChoice;
      return 'done';
    }

    const actorName = grid.order[index];
    const actorId = getActorId(this.kb, actorName);
    if (!actorId) {
      this.notice = MESSAGES.actorNotFound(actorName);
      return 'done';
    }

    const techniques = getTechniquesForActor(this.kb, actorId);
    if (techniques.length === 0) {
      this.notice = MESSAGES.noTechniques(actorName);
      return 'done';
    }

    log.debug(`Paging ${techniques.length} techniques for ${actorName}`);
    await this.pageTechniques(actorName, techniques);
    return 'done';
  }

  async pageTechniques(actorName: string, techniques: ActorTechnique[]): Promise<void> {
    const totalPages = pageCount(techniques.length, this.pageSize);
    let page = 1;

    for (;;) {
      const startNumber = (page - 1) * this.pageSize + 1;
      this.screen.clear();
      this.screen.print(
        renderTechniquePage(
          pageSlice(techniques, page, this.pageSize),
          actorName,
          techniques.length,
          startNumber,
          this.screen.width,
        ),
      );
      this.flushNotice();

      const action = resolvePagerInput(await this.prompter.input(pagerPrompt(page, totalPages)), page, totalPages);
      switch (action) {
        case 'next':
          page++;
          break;
        case 'previous':
          page--;
          break;
        case 'exit':
          return;
        case 'invalid':
          this.notice = MESSAGES.invalidInput;
          break;
      }
    }
  }

  // -----------------------------------------------------------------------
  // Tools
  // -----------------------------------------------------------------------

  async browseTools(): Promise<void> {
    const tools = this.getTools();
    if (tools.length === 0) {
      this.screen.print(chalk.bold.red('No tools found in the ATT&CK dataset.'));
      return;
    }

    for (;;) {
      this.screen.print(renderToolList(tools.map((tool) => tool.name)));
      this.screen.print();
      this.flushNotice();

      const index = parseSelection(await this.prompter.input(MESSAGES.toolPrompt), tools.length);
      if (index === undefined) {
        this.notice = MESSAGES.invalidChoice;
        continue;
      }

      const tool = tools[index];
      this.screen.print(
        renderToolPanel(
          tool,
          getTechniquesForTool(this.kb, tool.id),
          getActorsForTool(this.kb, tool.id),
          this.screen.width,
        ),
      );
      this.screen.print();

      const nav = await this.prompter.input(MESSAGES.toolAgainPrompt);
      if (nav.trim().toLowerCase() === 'q') return;
    }
  }

  // -----------------------------------------------------------------------
  // Helpers
  // -----------------------------------------------------------------------

  private showTitle(): void {
    this.screen.clear();
    this.screen.print(this.titleScreen ?? renderTitleScreen());
    this.flushNotice();
  }

  private flushNotice(): void {
    if (this.notice !== undefined) {
      this.screen.print(chalk.bold.red(this.notice));
      this.notice = undefined;
    }
  }

  private getActors(): ThreatActor[] {
    this.actors ??= getAllThreatActors(this.kb, this.classifier);
    return this.actors;
  }

  private getTools(): Tool[] {
    this.tools ??= loadTools(this.kb);
    return this.tools;
  }
}
