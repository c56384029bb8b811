import { Module } from '@nestjs/common';
import { ForecastService } from './forecast.service';
import { TomorrowWeatherService } from './tomorrow-weather.service';

@Module({
  providers: [TomorrowWeatherService, ForecastService],
  exports: [ForecastService],
})
export class WeatherModule {}
