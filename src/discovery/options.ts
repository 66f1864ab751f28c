/**
 * Path: src/discovery/options.ts
 * 디스커버리 페이로드 약어 키
 */

export enum Option {
    // origin
    Name = "name",
    SWVersion = "sw",
    SupportURL = "url",

    // component
    Availability = "avty",
    AvailabilityMode = "avty_mode",
    AvailabilityTopic = "avty_t",
    AvailabilityTemplate = "avty_tpl",
    CommandTopic = "cmd_t",
    CommandTemplate = "cmd_tpl",
    DeviceClass = "dev_cla",
    EnabledByDefault = "en",
    EntityCategory = "ent_cat",
    Icon = "ic",
    JSONAttributesTopic = "json_attr_t",
    JSONAttributesTemplate = "json_attr_tpl",
    ObjectID = "obj_id",
    Platform = "p",
    PayloadAvailable = "pl_avail",
    PayloadNotAvailable = "pl_not_avail",
    StateClass = "stat_cla",
    StateTopic = "stat_t",
    SuggestedDisplayPrecision = "sug_dsp_prc",
    UniqueID = "uniq_id",
    UnitOfMeasurement = "unit_of_meas",
    ValueTemplate = "val_tpl",
}

// 컴포넌트 platform
export enum Platform {
    BinarySensor = "binary_sensor",
    Button = "button",
    Sensor = "sensor",
    Switch = "switch",
}

// entity category
export const Diagnostic = "diagnostic"

export type Component = Record<string, unknown>

export function platformOf(component: Component): string {
    const platform = component[Option.Platform]
    return typeof platform === "string" ? platform : Platform.Sensor
}

// platform 만 남은 컴포넌트는 삭제 대상
export function isPlaceholder(component: Component): boolean {
    return Object.keys(component).length <= 1
}

export function placeholder(component: Component): Component {
    return { [Option.Platform]: platformOf(component) }
}
