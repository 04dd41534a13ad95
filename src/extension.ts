import type { Disposable } from './dataStructures';
import { DEFAULT_CONFIG, loadConfig, normalizeConfig, refreshConfigCache } from './configuration';
import { GuideController, type EditorHost } from './guideController';

export * from './dataStructures';
export { TextBuffer } from './textBuffer';
export { locate, indentationCandidates } from './levelLocator';
export { expand, spanFor } from './spanExpander';
export { LineRenderer, placeGuide } from './lineRenderer';
export { GlyphCache } from './glyphCache';
export { GuideController, computeGuideSpans } from './guideController';
export type { EditorHost, GuideControllerOptions } from './guideController';
export {
    DEFAULT_CONFIG,
    loadConfig,
    refreshConfigCache,
    saveConfig,
    initializeConfigFile,
    normalizeConfig
} from './configuration';
export type { GuideConfig, GuideConfigFile } from './configuration';

/**
 * An editor host that also reports its command loop
 */
export interface GuideHost extends EditorHost {
    onWillExecuteCommand(listener: () => void): Disposable;
    onDidExecuteCommand(listener: () => void): Disposable;
    /** Fired when the configuration file changed on disk */
    onDidChangeConfiguration?(listener: () => void): Disposable;
    /** Fired when fonts or theme change, invalidating cached glyphs */
    onDidChangeAppearance?(listener: () => void): Disposable;
}

export interface ActivationOptions {
    /** Directory holding the configuration file, defaults are used without one */
    workspaceRoot?: string;
}

export interface GuideSession extends Disposable {
    readonly controller: GuideController;
    reloadConfiguration(): void;
}

const sessions: Set<GuideSession> = new Set();

// This method is called when guides are switched on for a host
export function activate(host: GuideHost, options: ActivationOptions = {}): GuideSession {
    const { workspaceRoot } = options;
    const fileConfig = workspaceRoot ? loadConfig(workspaceRoot) : DEFAULT_CONFIG;
    const controller = new GuideController(host, normalizeConfig(fileConfig));
    const subscriptions: Disposable[] = [];

    subscriptions.push(host.onWillExecuteCommand(() => controller.handlePreCommand()));
    subscriptions.push(host.onDidExecuteCommand(() => controller.handlePostCommand()));

    const reloadConfiguration = (): void => {
        if (!workspaceRoot) {
            return;
        }
        console.log('Configuration file changed, refreshing cache and redrawing guides');
        controller.updateConfig(normalizeConfig(refreshConfigCache(workspaceRoot)));
        controller.show();
    };

    if (host.onDidChangeConfiguration) {
        subscriptions.push(host.onDidChangeConfiguration(reloadConfiguration));
    }

    if (host.onDidChangeAppearance) {
        subscriptions.push(host.onDidChangeAppearance(() => {
            controller.clear();
            controller.clearCache();
            controller.show();
        }));
    }

    const session: GuideSession = {
        controller,
        reloadConfiguration,
        dispose: () => {
            subscriptions.forEach(subscription => subscription.dispose());
            subscriptions.length = 0;
            controller.dispose();
            sessions.delete(session);
        }
    };

    sessions.add(session);
    console.log(`Indent guides active (${sessions.size} session${sessions.size === 1 ? '' : 's'})`);
    return session;
}

// This method is called when guides are switched off everywhere
export function deactivate(): void {
    for (const session of [...sessions]) {
        session.dispose();
    }
}
