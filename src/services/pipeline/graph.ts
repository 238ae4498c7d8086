// Graph strategy: a fixed linear chain of stages over an accumulating run state

import { Scene } from '../../types';
import { pipelineLogger } from '../../utils/logger';
import { segmentTextIntoScenes } from '../scene-segmentation';
import { PipelineDeps, VisualsRequest, processSceneImage, summarizeBestEffort, writeScenePrompt } from './stages';

export interface GraphNode<S> {
  name: string;
  run(state: S): Promise<Partial<S>>;
}

/**
 * Runs nodes strictly in declaration order, merging each node's partial
 * update into the state handed to the next one.
 */
export class LinearGraph<S extends object> {
  private readonly nodes: GraphNode<S>[];

  constructor(nodes: GraphNode<S>[]) {
    this.nodes = nodes;
  }

  get stageNames(): string[] {
    return this.nodes.map((node) => node.name);
  }

  async invoke(initial: S): Promise<S> {
    let state = initial;
    for (const node of this.nodes) {
      const startTime = Date.now();
      const update = await node.run(state);
      state = { ...state, ...update };
      pipelineLogger.debug(`Stage ${node.name} finished`, { durationMs: Date.now() - startTime });
    }
    return state;
  }
}

export interface VisualsGraphState {
  text: string;
  maxScenes: number;
  styleGuide?: string;
  globalSummary?: string;
  scenes: Scene[];
}

export function buildVisualsGraph(deps: PipelineDeps): LinearGraph<VisualsGraphState> {
  return new LinearGraph<VisualsGraphState>([
    {
      name: 'segment',
      run: async (state) => ({ scenes: await segmentTextIntoScenes(deps.text, state.text, state.maxScenes) }),
    },
    {
      name: 'summarize',
      run: async (state) => ({ globalSummary: await summarizeBestEffort(deps, state.text) }),
    },
    {
      name: 'prompts',
      run: async (state) => {
        const scenes: Scene[] = [];
        for (const scene of state.scenes) {
          scenes.push(await writeScenePrompt(deps, scene, state.globalSummary, state.styleGuide));
        }
        return { scenes };
      },
    },
    {
      name: 'images',
      run: async (state) => {
        const scenes: Scene[] = [];
        for (const scene of state.scenes) {
          scenes.push(await processSceneImage(deps, scene));
        }
        return { scenes };
      },
    },
  ]);
}

export async function runGraphVisuals(deps: PipelineDeps, request: VisualsRequest): Promise<Scene[]> {
  const final = await buildVisualsGraph(deps).invoke({
    text: request.text,
    maxScenes: request.maxScenes,
    styleGuide: request.styleGuide,
    scenes: [],
  });
  return final.scenes;
}
