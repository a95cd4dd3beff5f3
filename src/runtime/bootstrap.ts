import { createLogger, logManager } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { loadConfig, type AppConfig } from '@/config';
import { createRuntimePorts, type RuntimePorts } from '@/runtime/ports';
import { stopAll, type LifecycleService } from '@/runtime/stopWithTimeout';
import { SongCatalog } from '@/application/catalog/songCatalog';
import { WeatherCache } from '@/application/weather/weatherCache';
import { RotationService } from '@/application/rotation/rotationService';
import { OpenWeatherClient } from '@/adapters/weather/openWeatherClient';
import { FfmpegTrackDecoder } from '@/adapters/audio/ffmpegTrackDecoder';
import { LoopingStreamSink } from '@/adapters/audio/loopingStreamSink';
import { DirectoryCatalogSource } from '@/adapters/catalog/directoryCatalogSource';
import { HttpService } from '@/adapters/http/httpService';

export type Runtime = {
  start: () => Promise<void>;
  stop: () => Promise<void>;
};

const STOP_TIMEOUT_MS = 6000;

export function createRuntime(
  config: AppConfig = loadConfig(),
  ports: RuntimePorts = createRuntimePorts({ configFile: config.paths.configFile }),
): Runtime {
  let rotationService: RotationService | null = null;
  let sink: LoopingStreamSink | null = null;
  let httpService: HttpService | null = null;

  async function startServices(): Promise<void> {
    logManager.configure({ level: config.env.logLevel });
    const log = createLogger('Server');
    log.info('bootstrapping weather radio', { env: config.env.nodeEnv, configFile: config.paths.configFile });

    const stored = await ports.config.load();
    logManager.configure({ level: stored.logging.consoleLevel, json: stored.logging.json });

    if (!stored.weather.apiKey) {
      log.warn('weather api key is empty; conditions will fall back to the cached classification');
    }

    const catalog = await SongCatalog.load(
      new DirectoryCatalogSource(ports.storage, stored.catalog.songDir),
      {
        reservedPrefix: stored.catalog.reservedPrefix,
        duplicatePolicy: stored.catalog.duplicatePolicy,
      },
    );
    if (catalog.size === 0) {
      log.warn('song catalog is empty', { songDir: stored.catalog.songDir });
    }

    const weatherCache = new WeatherCache(
      new OpenWeatherClient({
        apiUrl: stored.weather.apiUrl,
        timeoutMs: stored.weather.requestTimeoutMs,
      }),
      ports.clock,
      { cooldownMs: stored.weather.cooldownMinutes * 60_000 },
    );
    const credentials = { location: stored.location, apiKey: stored.weather.apiKey };
    try {
      const weather = await weatherCache.fetch(credentials.location, credentials.apiKey);
      log.info('weather cache warmed', { weather });
    } catch (error) {
      log.warn('initial weather fetch failed', { message: errorMessage(error) });
    }

    sink = new LoopingStreamSink({
      sampleRate: stored.playback.sampleRate,
      channels: stored.playback.channels,
      tickMs: stored.playback.tickMs,
      timers: ports.timers,
    });
    rotationService = new RotationService({
      catalog,
      weatherCache,
      credentials,
      decoder: new FfmpegTrackDecoder({
        sampleRate: stored.playback.sampleRate,
        channels: stored.playback.channels,
      }),
      sink,
      notifier: ports.notifier,
      clock: ports.clock,
      timers: ports.timers,
      settings: {
        volume: stored.playback.volume,
        hourOffsetMs: stored.playback.hourOffsetMs,
      },
    });

    httpService = new HttpService(config.http, {
      service: rotationService,
      configPort: ports.config,
      sink,
      connections: ports.connections,
    });
    await httpService.start();

    log.info('startup complete', { songs: catalog.size });
  }

  async function stopServices(): Promise<void> {
    const log = createLogger('Server');
    const services: LifecycleService[] = [];
    const service = rotationService;
    if (service) {
      services.push({ name: 'rotation', stop: () => service.shutdown() });
    }
    const activeSink = sink;
    if (activeSink) {
      services.push({ name: 'stream-sink', stop: async () => activeSink.closeAll() });
    }
    const http = httpService;
    if (http) {
      services.push({ name: 'http', stop: () => http.stop() });
    }

    const outcome = await stopAll(services, { timeoutMs: STOP_TIMEOUT_MS, timers: ports.timers, log });
    log.debug('services stopped', outcome);

    rotationService = null;
    sink = null;
    httpService = null;
  }

  return {
    start: startServices,
    stop: stopServices,
  };
}
