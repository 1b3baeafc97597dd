import { AqiStatus } from '../utils/airQuality';

export type TrafficStatus = 'Light' | 'Moderate' | 'Heavy';

export interface TrafficRoute {
  routeName: string;
  /** minutes */
  duration: number;
  status: TrafficStatus;
}

export interface LocalInfo {
  trafficRoutes: TrafficRoute[];
  airQuality: { aqi: number; status: AqiStatus };
  /** 0-100 along the day arc */
  sunPosition: number;
}
