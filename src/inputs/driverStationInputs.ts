// src/inputs/driverStationInputs.ts

import type { LoggableInputs } from "../engine/loggableInputs";
import type { LogTable } from "../engine/logTable";

/**
 * Match-wide driver station state that changes throughout a match.
 * Key names are persisted; do not rename.
 */
export class DriverStationInputs implements LoggableInputs {
  allianceStation = 0;
  eventName = "";
  gameSpecificMessage = "";
  matchNumber = 0;
  replayNumber = 0;
  matchType = 0;
  matchTime = 0.0;

  enabled = false;
  autonomous = false;
  test = false;
  emergencyStop = false;
  fmsAttached = false;
  dsAttached = false;

  /** Back to the state of a driver station that has never connected. */
  reset(): void {
    this.allianceStation = 0;
    this.eventName = "";
    this.gameSpecificMessage = "";
    this.matchNumber = 0;
    this.replayNumber = 0;
    this.matchType = 0;
    this.matchTime = 0.0;
    this.enabled = false;
    this.autonomous = false;
    this.test = false;
    this.emergencyStop = false;
    this.fmsAttached = false;
    this.dsAttached = false;
  }

  serialize(table: LogTable): void {
    table.putInteger("AllianceStation", this.allianceStation);
    table.putString("EventName", this.eventName);
    table.putString("GameSpecificMessage", this.gameSpecificMessage);
    table.putInteger("MatchNumber", this.matchNumber);
    table.putInteger("ReplayNumber", this.replayNumber);
    table.putInteger("MatchType", this.matchType);
    table.putDouble("MatchTime", this.matchTime);

    table.putBoolean("Enabled", this.enabled);
    table.putBoolean("Autonomous", this.autonomous);
    table.putBoolean("Test", this.test);
    table.putBoolean("EmergencyStop", this.emergencyStop);
    table.putBoolean("FMSAttached", this.fmsAttached);
    table.putBoolean("DSAttached", this.dsAttached);
  }

  restore(table: LogTable): void {
    this.allianceStation = table.getInteger("AllianceStation", this.allianceStation);
    this.eventName = table.getString("EventName", this.eventName);
    this.gameSpecificMessage = table.getString("GameSpecificMessage", this.gameSpecificMessage);
    this.matchNumber = table.getInteger("MatchNumber", this.matchNumber);
    this.replayNumber = table.getInteger("ReplayNumber", this.replayNumber);
    this.matchType = table.getInteger("MatchType", this.matchType);
    this.matchTime = table.getDouble("MatchTime", this.matchTime);

    this.enabled = table.getBoolean("Enabled", this.enabled);
    this.autonomous = table.getBoolean("Autonomous", this.autonomous);
    this.test = table.getBoolean("Test", this.test);
    this.emergencyStop = table.getBoolean("EmergencyStop", this.emergencyStop);
    this.fmsAttached = table.getBoolean("FMSAttached", this.fmsAttached);
    this.dsAttached = table.getBoolean("DSAttached", this.dsAttached);
  }
}
