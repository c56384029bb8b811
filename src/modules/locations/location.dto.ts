import { Transform, TransformFnParams, Type } from 'class-transformer';
import {
  IsArray,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';

export interface Location {
  name?: string;
  lat: number;
  lon: number;
}

// Only non-blank strings are converted; booleans and blanks reach @IsNumber as-is and fail
function toCoordinate({ value }: TransformFnParams): unknown {
  return typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
}

export class LocationDto implements Location {
  @IsOptional()
  @IsString()
  name?: string;

  @Transform(toCoordinate)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(-90)
  @Max(90)
  lat!: number;

  @Transform(toCoordinate)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(-180)
  @Max(180)
  lon!: number;
}

export class LocationsFileDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LocationDto)
  locations!: LocationDto[];
}
