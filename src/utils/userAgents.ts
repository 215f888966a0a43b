import { ScraperConfig } from '../schemas/config';
import { Random, randomInt } from './random';

export function pickUserAgent(agents: readonly string[], random: Random = Math.random) {
  return agents[Math.min(agents.length - 1, Math.floor(random() * agents.length))];
}

export function randomViewport(config: Pick<ScraperConfig, 'windowWidth' | 'windowHeight'>, random: Random = Math.random) {
  return {
    width: randomInt(config.windowWidth[0], config.windowWidth[1], random),
    height: randomInt(config.windowHeight[0], config.windowHeight[1], random),
  };
}
