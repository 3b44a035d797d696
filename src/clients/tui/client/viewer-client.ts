/**
 * Viewer Client
 *
 * Owns the line index and viewport for one session, lays out the panes,
 * and turns key and mouse input into viewport commands.
 */

import { type Size, type KeyEvent, type MouseEvent, containsPoint } from '../types.ts';
import { Renderer, createRenderer } from '../rendering/renderer.ts';
import type { ScreenBuffer } from '../rendering/buffer.ts';
import { TUIInputHandler, createInputHandler } from '../input/input-handler.ts';
import type { ElementContext } from '../elements/base.ts';
import { LogTable } from '../elements/log-table.ts';
import { RecordDetail } from '../elements/record-detail.ts';
import { HelpOverlay } from '../overlays/help-overlay.ts';
import { StatusBar } from '../status-bar/status-bar.ts';
import { createKeybindingAdapter, keepsCount, type Unsubscribe } from './keybinding-adapter.ts';
import type { LineIndex } from '../../../core/line-index.ts';
import { Viewport } from '../../../core/viewport.ts';
import { CloseError } from '../../../core/errors.ts';
import { Settings } from '../../../config/settings.ts';
import { clipToWidth, getDisplayWidth, padToWidth } from '../../../core/char-width.ts';
import { debugLog } from '../../../debug.ts';

// ============================================
// Types
// ============================================

export interface ViewerClientOptions {
  index: LineIndex;
  version: string;
  settings?: Settings;
  /** Initial terminal size; defaults to stdout's */
  size?: Size;
  renderer?: Renderer;
  inputHandler?: TUIInputHandler;
  /** Called once after the client has stopped because the user quit */
  onExit?: () => void;
}

const TITLE = 'JSON Log Viewer';
const QUIT_PROMPT = 'Quit? (y/n)';

// Title row, column header row, status row
const CHROME_ROWS = 3;

// ============================================
// Viewer Client
// ============================================

export class ViewerClient {
  private readonly index: LineIndex;
  private readonly version: string;
  private readonly settings: Settings;
  private readonly viewport: Viewport;
  private readonly renderer: Renderer;
  private readonly inputHandler: TUIInputHandler;
  private readonly keybindings = createKeybindingAdapter();
  private readonly onExit: (() => void) | undefined;

  private readonly logTable: LogTable;
  private readonly recordDetail: RecordDetail;
  private readonly statusBar: StatusBar;
  private readonly helpOverlay: HelpOverlay;

  private size: Size;
  private tableWidth: number;

  // Vim-style prefix state
  private pendingCount = '';
  private lastG = false;

  private resizeMode = false;
  private resizeTimer: ReturnType<typeof setTimeout> | null = null;
  private confirmingExit = false;

  private running = false;
  private stopped = false;
  private renderScheduled = false;
  private unsubscribes: Unsubscribe[] = [];

  constructor(options: ViewerClientOptions) {
    this.index = options.index;
    this.version = options.version;
    this.settings = options.settings ?? new Settings();
    this.onExit = options.onExit;
    this.size = options.size ?? {
      width: process.stdout.columns || 80,
      height: process.stdout.rows || 24,
    };
    this.renderer = options.renderer ?? createRenderer(this.size);
    this.inputHandler = options.inputHandler ?? createInputHandler();
    this.tableWidth = this.settings.get('viewer.tableWidth');

    this.viewport = new Viewport(0, Math.max(1, this.size.height - CHROME_ROWS));
    this.viewport.setTotalLines(this.index.lineCount());

    const ctx: ElementContext = {
      markDirty: () => this.scheduleRender(),
      getThemeColor: (key, fallback) => this.settings.getColor(key, fallback),
    };

    this.logTable = new LogTable('log-table', ctx, this.index, this.viewport, {
      maxMessageLength: this.settings.get('viewer.messageMaxLength'),
      scrollWheelLines: this.settings.get('viewer.scrollWheelLines'),
    });
    this.recordDetail = new RecordDetail('record-detail', ctx, this.index, this.viewport);
    this.statusBar = new StatusBar({ getThemeColor: ctx.getThemeColor });
    this.helpOverlay = new HelpOverlay(
      {
        onDirty: () => this.scheduleRender(),
        getThemeColor: ctx.getThemeColor,
        getScreenSize: () => ({ ...this.size }),
      },
      () => this.keybindings.getHelpEntries()
    );

    this.registerCommands();
    this.watchSettings();
    this.layout();
    this.log(`Opened ${this.index.name()} (${this.index.lineCount()} lines)`);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  start(): void {
    if (this.running || this.stopped) return;
    this.running = true;

    this.unsubscribes.push(
      this.inputHandler.onKey((event) => this.handleKey(event)),
      this.inputHandler.onMouse((event) => this.handleMouse(event)),
      this.inputHandler.onResize((width, height) => this.handleResize({ width, height }))
    );

    this.renderer.initialize();
    this.inputHandler.start();
    this.render();
    this.log('Started');
  }

  /**
   * Restore the terminal and close the index. Safe to call more than once.
   */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.running = false;

    this.clearResizeTimer();
    for (const unsubscribe of this.unsubscribes) {
      unsubscribe();
    }
    this.unsubscribes = [];

    this.inputHandler.stop();
    this.renderer.cleanup();

    try {
      this.index.close();
    } catch (error) {
      if (!(error instanceof CloseError)) throw error;
      this.log(`${error.message}: ${String(error.cause)}`);
    }
    this.log('Stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  private quit(): void {
    this.log('Quit');
    this.stop();
    this.onExit?.();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Layout
  // ─────────────────────────────────────────────────────────────────────────

  handleResize(size: Size): void {
    this.size = size;
    this.renderer.resize(size);
    this.layout();
    this.log(`Resized to ${size.width}x${size.height}, ${this.viewport.state()}`);
    if (this.running) this.render();
  }

  private layout(): void {
    const { width, height } = this.size;
    const dataRows = Math.max(1, height - CHROME_ROWS);
    this.viewport.setHeight(dataRows);

    // Leave room for the separator
    const tableWidth = this.effectiveTableWidth();
    this.logTable.setBounds({ x: 0, y: 1, width: tableWidth, height: dataRows + 1 });
    this.recordDetail.setBounds({
      x: tableWidth + 1,
      y: 1,
      width: Math.max(0, width - tableWidth - 1),
      height: dataRows + 1,
    });
    this.statusBar.setBounds({ x: 0, y: height - 1, width, height: 1 });
  }

  private effectiveTableWidth(): number {
    return Math.max(0, Math.min(this.tableWidth, this.size.width - 1));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Commands
  // ─────────────────────────────────────────────────────────────────────────

  private registerCommands(): void {
    // Motions cancel a pending g and resize mode; all but the scroll keys drop the count
    const motion = (fn: () => void) => (args?: unknown) => {
      if (!keepsCount(args)) this.pendingCount = '';
      this.lastG = false;
      this.exitResizeMode();
      fn();
      this.scheduleRender();
    };

    this.unsubscribes.push(
      this.keybindings.registerCommands({
        'cursor.up': motion(() => this.viewport.up(1)),
        'cursor.down': motion(() => this.viewport.down(1)),
        'page.up': motion(() => this.viewport.pageUp()),
        'page.down': motion(() => this.viewport.pageDown()),
        'page.halfUp': motion(() => this.viewport.halfPageUp()),
        'page.halfDown': motion(() => this.viewport.halfPageDown()),
        'view.scrollUp': motion(() => this.viewport.scrollUp(1)),
        'view.scrollDown': motion(() => this.viewport.scrollDown(1)),
        'goto.top': motion(() => this.viewport.gotoTop()),
        'goto.bottom': motion(() => this.viewport.gotoBottom()),
        'screen.top': motion(() => this.viewport.gotoLineTop()),
        'screen.middle': motion(() => this.viewport.gotoLineMiddle()),
        'screen.bottom': motion(() => this.viewport.gotoLineBottom()),
        'detail.scrollUp': motion(() => this.recordDetail.scrollBy(-1)),
        'detail.scrollDown': motion(() => this.recordDetail.scrollBy(1)),

        'count.digit': (args) => {
          if (typeof args !== 'number') return;
          this.pendingCount += String(args);
          this.lastG = false;
        },
        'goto.g': () => this.handleG(),
        'goto.line': () => {
          this.lastG = false;
          this.exitResizeMode();
          const count = this.takeCount();
          if (count === null) {
            this.viewport.gotoBottom();
          } else if (count > 0) {
            this.viewport.goto(count);
          }
          this.scheduleRender();
        },
        'goto.percent': () => {
          this.lastG = false;
          this.exitResizeMode();
          const count = this.takeCount();
          if (count !== null) {
            this.viewport.jumpToPercent(count);
          }
          this.scheduleRender();
        },

        'resize.enter': () => this.enterResizeMode(),
        'resize.shrink': () => this.resizeTable(-1),
        'resize.grow': () => this.resizeTable(1),

        'help.toggle': () => this.helpOverlay.toggle(),
        'app.quit': () => this.quit(),
        'app.confirmQuit': () => {
          if (!this.settings.get('viewer.confirmExit')) {
            this.quit();
            return;
          }
          this.confirmingExit = true;
          this.scheduleRender();
        },
      }),
      this.keybindings.registerContext('resizeMode', () => this.resizeMode)
    );
  }

  private handleG(): void {
    this.exitResizeMode();
    if (!this.lastG) {
      this.lastG = true;
      return;
    }
    this.lastG = false;
    const count = this.takeCount();
    this.viewport.goto(count !== null && count > 0 ? count : 1);
    this.scheduleRender();
  }

  /**
   * Consume the pending count. null when none was typed.
   */
  private takeCount(): number | null {
    const pending = this.pendingCount;
    this.pendingCount = '';
    return pending === '' ? null : parseInt(pending, 10);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Resize Mode
  // ─────────────────────────────────────────────────────────────────────────

  private enterResizeMode(): void {
    this.resizeMode = true;
    this.lastG = false;
    this.armResizeTimer();
    this.scheduleRender();
  }

  private resizeTable(delta: number): void {
    const minPane = this.settings.get('viewer.minPaneWidth');
    const next = this.tableWidth + delta;
    if (delta < 0 ? next >= minPane : next <= this.size.width - minPane) {
      this.tableWidth = next;
      this.layout();
    }
    this.armResizeTimer();
    this.scheduleRender();
  }

  private armResizeTimer(): void {
    this.clearResizeTimer();
    this.resizeTimer = setTimeout(() => {
      this.resizeTimer = null;
      this.resizeMode = false;
      this.scheduleRender();
    }, this.settings.get('viewer.resizeModeTimeout'));
  }

  private exitResizeMode(): void {
    this.resizeMode = false;
    this.clearResizeTimer();
  }

  private clearResizeTimer(): void {
    if (this.resizeTimer) {
      clearTimeout(this.resizeTimer);
      this.resizeTimer = null;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Input
  // ─────────────────────────────────────────────────────────────────────────

  handleKey(event: KeyEvent): void {
    if (this.confirmingExit) {
      this.confirmingExit = false;
      if (!event.ctrl && !event.alt && event.key.toLowerCase() === 'y') {
        this.quit();
        return;
      }
      // Anything else cancels
      this.scheduleRender();
      return;
    }

    if (this.helpOverlay.handleInput(event)) return;

    if (!this.keybindings.handleKeyEvent(event)) {
      this.lastG = false;
    }
  }

  handleMouse(event: MouseEvent): void {
    if (this.helpOverlay.isVisible()) return;
    if (event.type === 'scroll' || containsPoint(this.logTable.getBounds(), event.x, event.y)) {
      this.logTable.handleMouse(event);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Settings
  // ─────────────────────────────────────────────────────────────────────────

  private watchSettings(): void {
    this.unsubscribes.push(
      this.settings.onChange('viewer.tableWidth', (width) => {
        this.tableWidth = width;
        this.layout();
        this.scheduleRender();
      }),
      this.settings.onChange('viewer.scrollWheelLines', (lines) => this.logTable.setScrollWheelLines(lines)),
      this.settings.onChange('viewer.messageMaxLength', (length) => {
        this.logTable.setMaxMessageLength(length);
        this.scheduleRender();
      })
    );
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Rendering
  // ─────────────────────────────────────────────────────────────────────────

  private scheduleRender(): void {
    if (this.renderScheduled) return;
    this.renderScheduled = true;

    setImmediate(() => {
      this.renderScheduled = false;
      if (this.running) {
        this.render();
      }
    });
  }

  /**
   * Draw every pane and flush the changes.
   */
  render(): void {
    const buffer = this.renderer.getBuffer();

    this.renderTitle(buffer);
    this.logTable.render(buffer);
    this.renderSeparator(buffer);
    this.recordDetail.render(buffer);

    this.statusBar.setItem('help', 'F1: Help', 0);
    this.statusBar.setItem('quit', 'q: Quit', 1);
    this.statusBar.setItem('state', this.viewport.state(), 2);
    this.statusBar.setItem('version', `v${this.version}`, 3);
    this.statusBar.setPrompt(this.confirmingExit ? QUIT_PROMPT : null);
    this.statusBar.render(buffer);

    this.helpOverlay.render(buffer);
    this.renderer.flush();
  }

  private renderTitle(buffer: ScreenBuffer): void {
    const { width } = this.size;
    const titleBg = this.settings.getColor('titleBar.background', '#7d56f4');
    const titleFg = this.settings.getColor('titleBar.foreground', '#fafafa');
    const bg = this.settings.getColor('editor.background', '#1e1e1e');
    const infoFg = this.settings.getColor('descriptionForeground', '#888888');

    const title = clipToWidth(` ${TITLE} `, width);
    buffer.writeString(0, 0, title, titleFg, titleBg, { bold: true });
    const used = getDisplayWidth(title);
    const info = ` ${this.index.lineCount()} lines | Line ${this.viewport.cursor} `;
    buffer.writeString(used, 0, padToWidth(info, width - used), infoFg, bg);
  }

  private renderSeparator(buffer: ScreenBuffer): void {
    const x = this.effectiveTableWidth();
    if (x >= this.size.width) return;
    const fg = this.settings.getColor('editorGroup.border', '#444444');
    const bg = this.settings.getColor('editor.background', '#1e1e1e');
    buffer.drawVLine(x, 1, this.viewport.height + 1, fg, bg);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // State Queries
  // ─────────────────────────────────────────────────────────────────────────

  getViewport(): Viewport {
    return this.viewport;
  }

  getRenderer(): Renderer {
    return this.renderer;
  }

  getTableWidth(): number {
    return this.tableWidth;
  }

  getDetailScrollTop(): number {
    return this.recordDetail.getScrollTop();
  }

  getPendingCount(): string {
    return this.pendingCount;
  }

  isResizeMode(): boolean {
    return this.resizeMode;
  }

  isConfirmingExit(): boolean {
    return this.confirmingExit;
  }

  isHelpVisible(): boolean {
    return this.helpOverlay.isVisible();
  }

  private log(message: string): void {
    debugLog(`[ViewerClient] ${message}`);
  }
}

// ============================================
// Factory Function
// ============================================

export function createViewerClient(options: ViewerClientOptions): ViewerClient {
  return new ViewerClient(options);
}
